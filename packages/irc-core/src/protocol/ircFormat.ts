import { IrcError } from "../errors";
import { demoteCommand, type CommandCode, type GenericCommand } from "./commands";
import type { IrcMessage, IrcTag } from "./ircParser";

const LINE_ENDING = "\r\n";
const LINE_BREAKS = /[\r\n\0]/;
const MIDDLE_FORBIDDEN = /[ \r\n\0]/;

const invalid = (message: string) => new IrcError("invalid", message);

const isMiddleParam = (param: string) => param.length > 0 && !param.startsWith(":") && !MIDDLE_FORBIDDEN.test(param);

const formatCode = (code: CommandCode) => {
  if (typeof code === "number") {
    if (!Number.isInteger(code) || code < 0 || code > 999) throw invalid(`Numeric code ${code} is out of range.`);
    return String(code).padStart(3, "0");
  }
  if (!/^[A-Z]+$/.test(code)) throw invalid(`Invalid command "${code}".`);
  return code;
};

const formatTags = (tags: IrcTag[]) =>
  tags
    .map(({ key, value }) => {
      if (!key || /[;= \r\n\0]/.test(key)) throw invalid(`Invalid tag key "${key}".`);
      if (value === undefined) return key;
      if (/[; \r\n\0]/.test(value)) throw invalid(`Tag "${key}" has a value that cannot be sent unescaped.`);
      return `${key}=${value}`;
    })
    .join(";");

/**
 * Serializes the command portion of a line, without the line ending.
 *
 * Without an explicit trailing parameter the last param is sent as trailing
 * when it would otherwise be ambiguous. Any earlier param that would need
 * that treatment is rejected.
 */
export const formatGenericCommand = (command: GenericCommand) => {
  const parts = [formatCode(command.code)];
  const middles = [...command.params];
  let trailing = command.trailing;

  const last = middles.at(-1);
  if (trailing === undefined && last !== undefined && !isMiddleParam(last)) {
    trailing = last;
    middles.pop();
  }

  for (const param of middles) {
    if (!isMiddleParam(param)) throw invalid(`Parameter "${param}" can only be sent as the trailing parameter.`);
    parts.push(param);
  }

  if (trailing !== undefined) {
    if (LINE_BREAKS.test(trailing)) throw invalid("Trailing parameter contains a line break or NUL.");
    parts.push(`:${trailing}`);
  }

  return parts.join(" ");
};

export const formatIrcMessage = (message: IrcMessage) => {
  let line = "";
  if (message.tags.length > 0) {
    line += `@${formatTags(message.tags)} `;
  }
  if (message.prefix !== undefined) {
    if (!message.prefix || MIDDLE_FORBIDDEN.test(message.prefix)) throw invalid(`Invalid prefix "${message.prefix}".`);
    line += `:${message.prefix} `;
  }
  return `${line}${formatGenericCommand(demoteCommand(message.command))}${LINE_ENDING}`;
};
