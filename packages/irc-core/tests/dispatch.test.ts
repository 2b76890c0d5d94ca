import { describe, expect, it } from "vitest";
import { ConnectionState } from "../src/client/connectionState";
import { deriveEvents } from "../src/client/dispatch";
import type { IrcCommand } from "../src/protocol/commands";

const NICK = "tester";

const derive = (state: ConnectionState, command: IrcCommand) =>
  deriveEvents(state, NICK, { tags: [], prefix: "irc.example.net", command });

describe("deriveEvents", () => {
  it("raises notices for the client or the wildcard target only", () => {
    const state = new ConnectionState();
    expect(derive(state, { type: "NOTICE", target: NICK, text: "hi" })).toEqual([{ type: "notice", text: "hi" }]);
    expect(derive(state, { type: "NOTICE", target: "*", text: "looking up" })).toEqual([
      { type: "notice", text: "looking up" }
    ]);
    expect(derive(state, { type: "NOTICE", target: "someone", text: "not ours" })).toEqual([]);
  });

  it("connects on a welcome addressed to the client", () => {
    const state = new ConnectionState();
    expect(derive(state, { type: "RPL_WELCOME", client: NICK, message: "Welcome" })).toEqual([
      { type: "statusChange" },
      { type: "welcomeMsg", text: "Welcome" }
    ]);
    expect(state.status).toBe("connected");
    expect(derive(state, { type: "RPL_WELCOME", client: NICK, message: "Welcome again" })).toEqual([
      { type: "welcomeMsg", text: "Welcome again" }
    ]);
  });

  it("ignores a welcome for someone else", () => {
    const state = new ConnectionState();
    expect(derive(state, { type: "RPL_WELCOME", client: "someone", message: "Welcome" })).toEqual([]);
    expect(state.status).toBe("connecting");
  });

  it("formats welcome-family replies", () => {
    const state = new ConnectionState();
    expect(
      derive(state, { type: "RPL_ISUPPORT", client: NICK, tokens: ["CHANTYPES=#", "NICKLEN=30"], message: "are supported" })
    ).toEqual([{ type: "welcomeMsg", text: "CHANTYPES=#, NICKLEN=30 are supported" }]);
    expect(derive(state, { type: "RPL_LUSEROP", client: NICK, count: 2, message: "operator(s) online" })).toEqual([
      { type: "welcomeMsg", text: "2 operator(s) online" }
    ]);
    expect(
      derive(state, { type: "RPL_HOSTHIDDEN", client: NICK, host: "user/tester", message: "is now your host" })
    ).toEqual([{ type: "welcomeMsg", text: "user/tester is now your host" }]);
    expect(derive(state, { type: "RPL_YOURHOST", client: "someone", message: "Your host" })).toEqual([]);
  });

  it("records server info from MYINFO", () => {
    const state = new ConnectionState();
    const events = derive(state, {
      type: "RPL_MYINFO",
      client: NICK,
      serverName: "irc.example.net",
      serverVersion: "ircd-1.0",
      userModes: "iow",
      channelModes: "beiklmnt",
      channelModeParams: "bkl"
    });
    expect(events).toEqual([]);
    expect(state.serverInfo).toEqual({
      serverName: "irc.example.net",
      serverVersion: "ircd-1.0",
      userModes: "iow",
      channelModes: "beiklmnt",
      channelModeParams: "bkl"
    });
  });

  it("raises the MOTD event only when the MOTD completes", () => {
    const state = new ConnectionState();
    expect(derive(state, { type: "RPL_MOTDSTART", client: NICK, line: "Welcome" })).toEqual([]);
    expect(derive(state, { type: "RPL_MOTD", client: NICK, line: "line2" })).toEqual([]);
    expect(derive(state, { type: "RPL_ENDOFMOTD", client: NICK, line: "bye" })).toEqual([{ type: "motd" }]);
    expect(state.motd).toEqual({ state: "done", text: "Welcome\nline2\nbye" });
  });

  it("reports a MOTD line that arrives before the start", () => {
    const state = new ConnectionState();
    const events = derive(state, { type: "RPL_MOTD", client: NICK, line: "stray" });
    expect(events).toHaveLength(1);
    expect(events[0]).toMatchObject({ type: "protocolError", error: { kind: "ordering" } });
    expect(state.motd).toEqual({ state: "empty" });
  });

  it("passes errors through and leaves pings silent", () => {
    const state = new ConnectionState();
    expect(derive(state, { type: "ERROR", message: "Closing link" })).toEqual([{ type: "errorMsg", text: "Closing link" }]);
    expect(derive(state, { type: "PING", token: "abc" })).toEqual([]);
  });

  it("marks anything else unhandled", () => {
    const state = new ConnectionState();
    const command: IrcCommand = { type: "GENERIC", command: { code: "PRIVMSG", params: ["#chan"], trailing: "hi" } };
    expect(derive(state, command)).toEqual([
      { type: "unhandledMessage", message: { tags: [], prefix: "irc.example.net", command } }
    ]);
  });
});
