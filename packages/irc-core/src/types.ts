import type { IrcError } from "./errors";
import type { IrcMessage } from "./protocol/ircParser";

export type ConnectionStatus = "connecting" | "connected" | "disconnected";

export type MotdState =
  | { state: "empty" }
  | { state: "building"; text: string }
  | { state: "done"; text: string };

export type ServerInfo = {
  serverName: string;
  serverVersion: string;
  userModes: string;
  channelModes: string;
  channelModeParams?: string;
};

/** Connection facts as they stood when an event was raised. */
export type IrcContext = Readonly<{
  status: ConnectionStatus;
  motd: MotdState;
}>;

export type IrcEvent =
  | { type: "rawMessage"; message: IrcMessage }
  | { type: "statusChange" }
  | { type: "welcomeMsg"; text: string }
  | { type: "errorMsg"; text: string }
  | { type: "notice"; text: string }
  | { type: "motd" }
  | { type: "unhandledMessage"; message: IrcMessage }
  | { type: "protocolError"; error: IrcError };

export type IrcEventHandler = {
  onEvent: (context: IrcContext, event: IrcEvent) => void;
};

export type IrcAddress = {
  host: string;
  port: number;
  tls: boolean;
};

export type IrcTransport = {
  /** Resolves with the next CRLF-terminated line, or null once the stream has ended. */
  readLine: () => Promise<string | null>;
  write: (data: string) => Promise<void>;
  close: () => Promise<void>;
};

export type TransportConnector = (address: IrcAddress) => Promise<IrcTransport>;

export type IrcClientOptions = {
  host: string;
  port?: number;
  tls?: boolean;
  nickname: string;
  username?: string;
  realname?: string;
  password?: string;
  handlers?: IrcEventHandler[];
  logger?: (message: string) => void;
  connector?: TransportConnector;
};
