import EventEmitter from "eventemitter3";
import { IrcError, isIrcError, toIrcError, withLine } from "../errors";
import { promoteCommand, type GenericCommand, type IrcCommand } from "../protocol/commands";
import { formatIrcMessage } from "../protocol/ircFormat";
import { parseGenericMessage, type GenericMessage, type IrcMessage } from "../protocol/ircParser";
import { connectSocket } from "../transport/socketTransport";
import type {
  IrcAddress,
  IrcClientOptions,
  IrcContext,
  IrcEvent,
  IrcEventHandler,
  IrcTransport,
  TransportConnector
} from "../types";
import { ConnectionState } from "./connectionState";
import { deriveEvents } from "./dispatch";

type ClientEvents = {
  event: [context: IrcContext, event: IrcEvent];
};

const DEFAULT_PORT = 6667;
const DEFAULT_TLS_PORT = 6697;

const describeError = (error: unknown) => (error instanceof Error ? error.message : String(error));

const assertToken = (label: string, value: string) => {
  if (!value || /[ \r\n\0]/.test(value)) {
    throw new Error(`${label} must be non-empty and cannot contain spaces or line breaks.`);
  }
};

const outbound = (command: IrcCommand): IrcMessage => ({ tags: [], command });

export class IrcClient {
  private emitter = new EventEmitter<ClientEvents>();
  private transport: IrcTransport | null = null;
  private state = new ConnectionState();
  private readLoop: Promise<void> = Promise.resolve();
  private connecting = false;
  private readonly address: IrcAddress;
  private readonly nick: string;
  private readonly username: string;
  private readonly realname: string;
  private readonly password?: string;
  private readonly connector: TransportConnector;
  private readonly logger?: (message: string) => void;

  constructor(options: IrcClientOptions) {
    const tls = options.tls ?? false;
    const port = options.port ?? (tls ? DEFAULT_TLS_PORT : DEFAULT_PORT);
    if (!options.host) throw new Error("An IRC host is required.");
    if (!Number.isInteger(port) || port < 1 || port > 65535) throw new Error(`Invalid port ${port}.`);
    assertToken("Nickname", options.nickname);

    this.address = { host: options.host, port, tls };
    this.nick = options.nickname;
    this.username = options.username ?? options.nickname;
    this.realname = options.realname ?? options.nickname;
    this.password = options.password;
    this.connector = options.connector ?? connectSocket;
    this.logger = options.logger;
    assertToken("Username", this.username);

    options.handlers?.forEach((handler) => this.addHandler(handler));
  }

  get nickname() {
    return this.nick;
  }

  get status() {
    return this.state.status;
  }

  get motd() {
    return this.state.motd;
  }

  get serverInfo() {
    return this.state.serverInfo;
  }

  /** Settles once the read loop has stopped and the disconnect has been reported. */
  get closed() {
    return this.readLoop;
  }

  context() {
    return this.state.snapshot();
  }

  addHandler(handler: IrcEventHandler) {
    this.onEvent((context, event) => handler.onEvent(context, event));
  }

  onEvent(listener: (context: IrcContext, event: IrcEvent) => void) {
    this.emitter.on("event", (context, event) => {
      try {
        listener(context, event);
      } catch (error) {
        this.logger?.(`Event handler failed on ${event.type}: ${describeError(error)}`);
      }
    });
  }

  async connect() {
    if (this.transport || this.connecting) throw new Error("IRC client is already connected.");
    this.connecting = true;
    try {
      await this.open();
    } finally {
      this.connecting = false;
    }
  }

  async send(value: IrcCommand | IrcMessage) {
    const transport = this.transport;
    if (!transport) throw new IrcError("transport", "IRC client is not connected.");
    const line = formatIrcMessage("tags" in value ? value : outbound(value));
    try {
      await transport.write(line);
    } catch (error) {
      throw toIrcError("transport", error);
    }
  }

  async disconnect(reason?: string) {
    const transport = this.transport;
    if (!transport) return;
    const quit: GenericCommand = { code: "QUIT", params: [] };
    if (reason !== undefined) quit.trailing = reason;
    try {
      await transport.write(formatIrcMessage(outbound({ type: "GENERIC", command: quit })));
    } catch (error) {
      throw toIrcError("transport", error);
    } finally {
      await transport.close();
      await this.readLoop;
    }
  }

  private emit(event: IrcEvent, context: IrcContext) {
    this.emitter.emit("event", context, event);
  }

  private reportError(error: IrcError, context: IrcContext) {
    this.logger?.(`IRC ${error.kind} error: ${error.message}`);
    this.emit({ type: "protocolError", error }, context);
  }

  private async open() {
    const state = new ConnectionState();
    this.state = state;
    const { host, port, tls } = this.address;
    this.logger?.(`Connecting to ${host}:${port}${tls ? " (tls)" : ""}...`);

    let transport: IrcTransport;
    try {
      transport = await this.connector(this.address);
    } catch (error) {
      const failure = toIrcError("transport", error);
      this.reportError(failure, state.snapshot());
      state.markDisconnected();
      this.emit({ type: "statusChange" }, state.snapshot());
      throw failure;
    }

    this.transport = transport;
    this.emit({ type: "statusChange" }, state.snapshot());

    try {
      await this.register(transport);
    } catch (error) {
      const failure = toIrcError("transport", error);
      await this.finish(transport, state, failure);
      throw failure;
    }

    this.readLoop = this.runReadLoop(transport, state);
  }

  private async register(transport: IrcTransport) {
    const commands: IrcCommand[] = [
      { type: "NICK", nickname: this.nick },
      { type: "USER", username: this.username, realname: this.realname }
    ];
    if (this.password !== undefined) commands.unshift({ type: "PASS", password: this.password });

    for (const command of commands) {
      await transport.write(formatIrcMessage(outbound(command)));
    }
    this.logger?.(`Registering as ${this.nick}.`);
  }

  private async runReadLoop(transport: IrcTransport, state: ConnectionState) {
    let failure: IrcError | undefined;
    try {
      for (;;) {
        const line = await transport.readLine();
        if (line === null) break;
        await this.handleLine(transport, state, line);
      }
    } catch (error) {
      failure = toIrcError("transport", error);
    }
    await this.finish(transport, state, failure);
  }

  private async handleLine(transport: IrcTransport, state: ConnectionState, line: string) {
    let generic: GenericMessage;
    try {
      generic = parseGenericMessage(line);
    } catch (error) {
      if (!isIrcError(error)) throw error;
      this.reportError(error, state.snapshot());
      return;
    }

    const message = this.promote(generic, line, state);
    if (message.command.type === "PING") {
      await transport.write(formatIrcMessage(outbound({ type: "PONG", token: message.command.token })));
    }

    const events = deriveEvents(state, this.nick, message);
    const context = state.snapshot();
    this.emit({ type: "rawMessage", message }, context);
    for (const event of events) {
      if (event.type === "protocolError") {
        this.reportError(withLine(event.error, line), context);
        continue;
      }
      if (event.type === "unhandledMessage") this.logger?.(`Unhandled message: ${line.trimEnd()}`);
      this.emit(event, context);
    }
  }

  private promote(generic: GenericMessage, line: string, state: ConnectionState): IrcMessage {
    const { command, ...rest } = generic;
    try {
      return { ...rest, command: promoteCommand(command) };
    } catch (error) {
      if (!isIrcError(error)) throw error;
      this.reportError(withLine(error, line), state.snapshot());
      return { ...rest, command: { type: "GENERIC", command } };
    }
  }

  // Only touches the state of the connection being finished; a newer connect() may already own this.state.
  private async finish(transport: IrcTransport, state: ConnectionState, failure?: IrcError) {
    if (this.transport === transport) this.transport = null;
    if (failure) this.reportError(failure, state.snapshot());
    try {
      await transport.close();
    } catch (error) {
      this.logger?.(`Failed to close IRC transport: ${describeError(error)}`);
    }
    state.markDisconnected();
    this.logger?.("IRC connection closed.");
    this.emit({ type: "statusChange" }, state.snapshot());
  }
}
