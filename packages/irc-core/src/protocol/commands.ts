import { IrcError } from "../errors";

export type CommandCode = string | number;

export type GenericCommand = {
  code: CommandCode;
  params: string[];
  trailing?: string;
};

export type UserCounts = {
  current: number;
  max: number;
};

type ClientTextReply<T extends string> = { type: T; client: string; message: string };
type ClientCountReply<T extends string> = { type: T; client: string; count: number; message: string };
type UserCountReply<T extends string> = { type: T; client: string; users?: UserCounts; message: string };
type MotdReply<T extends string> = { type: T; client: string; line: string };

export type IrcCommand =
  | { type: "PASS"; password: string }
  | { type: "NICK"; nickname: string }
  | { type: "USER"; username: string; realname: string }
  | { type: "PING"; token: string; server?: string }
  | { type: "PONG"; server?: string; token: string }
  | { type: "NOTICE"; target: string; text: string }
  | { type: "ERROR"; message: string }
  | ClientTextReply<"RPL_WELCOME">
  | ClientTextReply<"RPL_YOURHOST">
  | ClientTextReply<"RPL_CREATED">
  | {
      type: "RPL_MYINFO";
      client: string;
      serverName: string;
      serverVersion: string;
      userModes: string;
      channelModes: string;
      channelModeParams?: string;
    }
  | { type: "RPL_ISUPPORT"; client: string; tokens: string[]; message: string }
  | ClientTextReply<"RPL_LUSERCLIENT">
  | ClientCountReply<"RPL_LUSEROP">
  | ClientCountReply<"RPL_LUSERUNKNOWN">
  | ClientCountReply<"RPL_LUSERCHANNELS">
  | ClientTextReply<"RPL_LUSERME">
  | UserCountReply<"RPL_LOCALUSERS">
  | UserCountReply<"RPL_GLOBALUSERS">
  | MotdReply<"RPL_MOTD">
  | MotdReply<"RPL_MOTDSTART">
  | MotdReply<"RPL_ENDOFMOTD">
  | { type: "RPL_HOSTHIDDEN"; client: string; host: string; message: string }
  | { type: "GENERIC"; command: GenericCommand };

export const NUMERIC_REPLIES = {
  RPL_WELCOME: 1,
  RPL_YOURHOST: 2,
  RPL_CREATED: 3,
  RPL_MYINFO: 4,
  RPL_ISUPPORT: 5,
  RPL_LUSERCLIENT: 251,
  RPL_LUSEROP: 252,
  RPL_LUSERUNKNOWN: 253,
  RPL_LUSERCHANNELS: 254,
  RPL_LUSERME: 255,
  RPL_LOCALUSERS: 265,
  RPL_GLOBALUSERS: 266,
  RPL_MOTD: 372,
  RPL_MOTDSTART: 375,
  RPL_ENDOFMOTD: 376,
  RPL_HOSTHIDDEN: 396
} as const;

export const commandCodeLabel = (code: CommandCode) =>
  typeof code === "number" ? String(code).padStart(3, "0") : code;

const allParams = (command: GenericCommand) =>
  command.trailing === undefined ? command.params : [...command.params, command.trailing];

const expectArity = (label: string, params: string[], min: number, max = min) => {
  if (params.length < min) {
    throw new IrcError("missing-parameter", `${label} expects at least ${min} parameter(s), got ${params.length}.`);
  }
  if (params.length > max) {
    throw new IrcError("invalid", `${label} expects at most ${max} parameter(s), got ${params.length}.`);
  }
};

const parseCount = (label: string, value: string) => {
  if (!/^[0-9]+$/.test(value)) {
    throw new IrcError("invalid", `${label} expects a numeric count, got "${value}".`);
  }
  return Number(value);
};

const clientText = <T extends string>(type: T, label: string, params: string[]): ClientTextReply<T> => {
  expectArity(label, params, 2);
  return { type, client: params[0], message: params[1] };
};

const clientCount = <T extends string>(type: T, label: string, params: string[]): ClientCountReply<T> => {
  expectArity(label, params, 3);
  return { type, client: params[0], count: parseCount(label, params[1]), message: params[2] };
};

// 265/266 carry either just the message or "<current> <max> :<message>" after the client.
const userCounts = <T extends string>(type: T, label: string, params: string[]): UserCountReply<T> => {
  if (params.length === 2) {
    return { type, client: params[0], message: params[1] };
  }
  if (params.length === 4) {
    return {
      type,
      client: params[0],
      users: { current: parseCount(label, params[1]), max: parseCount(label, params[2]) },
      message: params[3]
    };
  }
  if (params.length < 2) {
    throw new IrcError("missing-parameter", `${label} expects 2 or 4 parameters, got ${params.length}.`);
  }
  throw new IrcError("invalid", `${label} expects 2 or 4 parameters, got ${params.length}.`);
};

const motdLine = <T extends string>(type: T, label: string, params: string[]): MotdReply<T> => {
  expectArity(label, params, 2);
  return { type, client: params[0], line: params[1] };
};

const promoteText = (generic: GenericCommand, code: string): IrcCommand => {
  const params = allParams(generic);
  switch (code) {
    case "PASS":
      expectArity(code, params, 1);
      return { type: "PASS", password: params[0] };
    case "NICK":
      expectArity(code, params, 1);
      return { type: "NICK", nickname: params[0] };
    case "USER":
      expectArity(code, params, 2, Number.POSITIVE_INFINITY);
      return { type: "USER", username: params[0], realname: params[params.length - 1] };
    // "PING <token> [<server>]": the optional second server is the one the ping is forwarded to.
    case "PING":
      expectArity(code, params, 1, 2);
      return params.length === 2
        ? { type: "PING", token: params[0], server: params[1] }
        : { type: "PING", token: params[0] };
    case "PONG":
      expectArity(code, params, 1, 2);
      return params.length === 2
        ? { type: "PONG", server: params[0], token: params[1] }
        : { type: "PONG", token: params[0] };
    case "NOTICE":
      expectArity(code, params, 2);
      return { type: "NOTICE", target: params[0], text: params[1] };
    case "ERROR":
      expectArity(code, params, 1);
      return { type: "ERROR", message: params[0] };
    default:
      return { type: "GENERIC", command: generic };
  }
};

const promoteNumeric = (generic: GenericCommand, code: number): IrcCommand => {
  const params = allParams(generic);
  const label = commandCodeLabel(code);
  switch (code) {
    case NUMERIC_REPLIES.RPL_WELCOME:
      return clientText("RPL_WELCOME", label, params);
    case NUMERIC_REPLIES.RPL_YOURHOST:
      return clientText("RPL_YOURHOST", label, params);
    case NUMERIC_REPLIES.RPL_CREATED:
      return clientText("RPL_CREATED", label, params);
    case NUMERIC_REPLIES.RPL_MYINFO: {
      expectArity(label, params, 5, 6);
      const [client, serverName, serverVersion, userModes, channelModes] = params;
      const info = { type: "RPL_MYINFO", client, serverName, serverVersion, userModes, channelModes } as const;
      return params.length === 6 ? { ...info, channelModeParams: params[5] } : info;
    }
    case NUMERIC_REPLIES.RPL_ISUPPORT:
      expectArity(label, params, 2, Number.POSITIVE_INFINITY);
      return {
        type: "RPL_ISUPPORT",
        client: params[0],
        tokens: params.slice(1, -1),
        message: params[params.length - 1]
      };
    case NUMERIC_REPLIES.RPL_LUSERCLIENT:
      return clientText("RPL_LUSERCLIENT", label, params);
    case NUMERIC_REPLIES.RPL_LUSEROP:
      return clientCount("RPL_LUSEROP", label, params);
    case NUMERIC_REPLIES.RPL_LUSERUNKNOWN:
      return clientCount("RPL_LUSERUNKNOWN", label, params);
    case NUMERIC_REPLIES.RPL_LUSERCHANNELS:
      return clientCount("RPL_LUSERCHANNELS", label, params);
    case NUMERIC_REPLIES.RPL_LUSERME:
      return clientText("RPL_LUSERME", label, params);
    case NUMERIC_REPLIES.RPL_LOCALUSERS:
      return userCounts("RPL_LOCALUSERS", label, params);
    case NUMERIC_REPLIES.RPL_GLOBALUSERS:
      return userCounts("RPL_GLOBALUSERS", label, params);
    case NUMERIC_REPLIES.RPL_MOTD:
      return motdLine("RPL_MOTD", label, params);
    case NUMERIC_REPLIES.RPL_MOTDSTART:
      return motdLine("RPL_MOTDSTART", label, params);
    case NUMERIC_REPLIES.RPL_ENDOFMOTD:
      return motdLine("RPL_ENDOFMOTD", label, params);
    case NUMERIC_REPLIES.RPL_HOSTHIDDEN:
      expectArity(label, params, 3);
      return { type: "RPL_HOSTHIDDEN", client: params[0], host: params[1], message: params[2] };
    default:
      return { type: "GENERIC", command: generic };
  }
};

/** Turns a generic command into its typed form. Unknown codes stay generic. */
export const promoteCommand = (generic: GenericCommand): IrcCommand =>
  typeof generic.code === "number" ? promoteNumeric(generic, generic.code) : promoteText(generic, generic.code);

/**
 * Inverse of {@link promoteCommand}. Free-text fields go to the trailing
 * parameter so they survive spaces on the wire.
 */
export const demoteCommand = (command: IrcCommand): GenericCommand => {
  switch (command.type) {
    case "PASS":
      return { code: "PASS", params: [command.password] };
    case "NICK":
      return { code: "NICK", params: [command.nickname] };
    case "USER":
      return { code: "USER", params: [command.username, "0", "*"], trailing: command.realname };
    case "PING":
      return command.server === undefined
        ? { code: "PING", params: [], trailing: command.token }
        : { code: "PING", params: [command.token], trailing: command.server };
    case "PONG":
      return {
        code: "PONG",
        params: command.server === undefined ? [] : [command.server],
        trailing: command.token
      };
    case "NOTICE":
      return { code: "NOTICE", params: [command.target], trailing: command.text };
    case "ERROR":
      return { code: "ERROR", params: [], trailing: command.message };
    case "RPL_WELCOME":
    case "RPL_YOURHOST":
    case "RPL_CREATED":
    case "RPL_LUSERCLIENT":
    case "RPL_LUSERME":
      return { code: NUMERIC_REPLIES[command.type], params: [command.client], trailing: command.message };
    case "RPL_MYINFO": {
      const params = [
        command.client,
        command.serverName,
        command.serverVersion,
        command.userModes,
        command.channelModes
      ];
      if (command.channelModeParams !== undefined) params.push(command.channelModeParams);
      return { code: NUMERIC_REPLIES.RPL_MYINFO, params };
    }
    case "RPL_ISUPPORT":
      return {
        code: NUMERIC_REPLIES.RPL_ISUPPORT,
        params: [command.client, ...command.tokens],
        trailing: command.message
      };
    case "RPL_LUSEROP":
    case "RPL_LUSERUNKNOWN":
    case "RPL_LUSERCHANNELS":
      return {
        code: NUMERIC_REPLIES[command.type],
        params: [command.client, String(command.count)],
        trailing: command.message
      };
    case "RPL_LOCALUSERS":
    case "RPL_GLOBALUSERS":
      return {
        code: NUMERIC_REPLIES[command.type],
        params: command.users
          ? [command.client, String(command.users.current), String(command.users.max)]
          : [command.client],
        trailing: command.message
      };
    case "RPL_MOTD":
    case "RPL_MOTDSTART":
    case "RPL_ENDOFMOTD":
      return { code: NUMERIC_REPLIES[command.type], params: [command.client], trailing: command.line };
    case "RPL_HOSTHIDDEN":
      return {
        code: NUMERIC_REPLIES.RPL_HOSTHIDDEN,
        params: [command.client, command.host],
        trailing: command.message
      };
    case "GENERIC":
      return command.command;
  }
};
