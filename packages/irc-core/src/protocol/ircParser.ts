import { IrcError, isIrcError, withLine } from "../errors";
import { promoteCommand, type CommandCode, type GenericCommand, type IrcCommand } from "./commands";

export type IrcTag = {
  key: string;
  value?: string;
};

export type GenericMessage = {
  tags: IrcTag[];
  prefix?: string;
  command: GenericCommand;
};

export type IrcMessage = {
  tags: IrcTag[];
  prefix?: string;
  command: IrcCommand;
};

// [@tags ][:prefix ]COMMAND[ middle]*[ :trailing]\r\n
const LINE_PATTERN =
  /^(?:@([^\r\n\0 ]+) )?(?::([^\r\n\0 ]+) )?([^\r\n\0 ]*)((?: [^:\r\n\0 ][^\r\n\0 ]*)*)(?: :([^\r\n\0]*))?\r\n$/;

const parseTags = (raw: string, line: string): IrcTag[] =>
  raw.split(";").map((entry) => {
    const separator = entry.indexOf("=");
    const key = separator === -1 ? entry : entry.slice(0, separator);
    if (!key) throw new IrcError("no-match", "Tag with an empty key.", { line });
    return separator === -1 ? { key } : { key, value: entry.slice(separator + 1) };
  });

const parseCode = (token: string, line: string): CommandCode => {
  if (/^[0-9]{3}$/.test(token)) return Number(token);
  if (/^[A-Z]+$/.test(token)) return token;
  throw new IrcError("invalid", `Invalid command "${token}".`, { line });
};

/** Applies the line grammar without mapping the command to a typed variant. */
export const parseGenericMessage = (line: string): GenericMessage => {
  const match = LINE_PATTERN.exec(line);
  if (!match) throw new IrcError("no-match", "Line does not match the message grammar.", { line });

  const [, rawTags, prefix, token, middles, trailing] = match;
  if (!token) throw new IrcError("no-command", "Line is missing a command.", { line });

  const command: GenericCommand = {
    code: parseCode(token, line),
    params: middles ? middles.slice(1).split(" ") : []
  };
  if (trailing !== undefined) command.trailing = trailing;

  const message: GenericMessage = { tags: rawTags ? parseTags(rawTags, line) : [], command };
  if (prefix !== undefined) message.prefix = prefix;
  return message;
};

export const parseIrcMessage = (line: string): IrcMessage => {
  const { command, ...rest } = parseGenericMessage(line);
  try {
    return { ...rest, command: promoteCommand(command) };
  } catch (error) {
    if (isIrcError(error)) throw withLine(error, line);
    throw error;
  }
};
