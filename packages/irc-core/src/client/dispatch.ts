import { isIrcError } from "../errors";
import type { IrcMessage } from "../protocol/ircParser";
import type { IrcEvent } from "../types";
import type { ConnectionState } from "./connectionState";

const WILDCARD_TARGET = "*";

const isTargeted = (target: string, nickname: string) => target === nickname || target === WILDCARD_TARGET;

const welcome = (text: string): IrcEvent[] => [{ type: "welcomeMsg", text }];

const applyMotd = (transition: () => void, events: IrcEvent[] = []): IrcEvent[] => {
  try {
    transition();
  } catch (error) {
    if (isIrcError(error)) return [{ type: "protocolError", error }];
    throw error;
  }
  return events;
};

/**
 * Applies any state transition the message triggers and returns the semantic
 * events to raise after the raw message.
 */
export const deriveEvents = (state: ConnectionState, nickname: string, message: IrcMessage): IrcEvent[] => {
  const command = message.command;

  switch (command.type) {
    case "NOTICE":
      return isTargeted(command.target, nickname) ? [{ type: "notice", text: command.text }] : [];
    case "ERROR":
      return [{ type: "errorMsg", text: command.message }];
    case "RPL_WELCOME":
      if (!isTargeted(command.client, nickname)) return [];
      if (command.client === nickname && state.markConnected()) {
        return [{ type: "statusChange" }, ...welcome(command.message)];
      }
      return welcome(command.message);
    case "RPL_YOURHOST":
    case "RPL_CREATED":
    case "RPL_LUSERCLIENT":
    case "RPL_LUSERME":
    case "RPL_LOCALUSERS":
    case "RPL_GLOBALUSERS":
      return isTargeted(command.client, nickname) ? welcome(command.message) : [];
    case "RPL_ISUPPORT":
      return isTargeted(command.client, nickname) ? welcome(`${command.tokens.join(", ")} ${command.message}`) : [];
    case "RPL_LUSEROP":
    case "RPL_LUSERUNKNOWN":
    case "RPL_LUSERCHANNELS":
      return isTargeted(command.client, nickname) ? welcome(`${command.count} ${command.message}`) : [];
    case "RPL_HOSTHIDDEN":
      return isTargeted(command.client, nickname) ? welcome(`${command.host} ${command.message}`) : [];
    case "RPL_MYINFO":
      if (command.client === nickname) {
        state.setServerInfo({
          serverName: command.serverName,
          serverVersion: command.serverVersion,
          userModes: command.userModes,
          channelModes: command.channelModes,
          ...(command.channelModeParams === undefined ? {} : { channelModeParams: command.channelModeParams })
        });
      }
      return [];
    case "RPL_MOTDSTART":
      return command.client === nickname ? applyMotd(() => state.startMotd(command.line)) : [];
    case "RPL_MOTD":
      return command.client === nickname ? applyMotd(() => state.appendMotd(command.line)) : [];
    case "RPL_ENDOFMOTD":
      return command.client === nickname ? applyMotd(() => state.finishMotd(command.line), [{ type: "motd" }]) : [];
    case "PING":
      return [];
    default:
      return [{ type: "unhandledMessage", message }];
  }
};
