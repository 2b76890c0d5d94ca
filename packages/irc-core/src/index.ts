export * from "./types";
export * from "./errors";
export * from "./protocol/commands";
export * from "./protocol/ircParser";
export * from "./protocol/ircFormat";
export * from "./client/connectionState";
export * from "./client/dispatch";
export * from "./client/ircClient";
export * from "./transport/socketTransport";
