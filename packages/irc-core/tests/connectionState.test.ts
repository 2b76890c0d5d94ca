import { describe, expect, it } from "vitest";
import { ConnectionState } from "../src/client/connectionState";
import { failureOf } from "./helpers";

describe("ConnectionState", () => {
  it("starts connecting with an empty MOTD", () => {
    const state = new ConnectionState();
    expect(state.snapshot()).toEqual({ status: "connecting", motd: { state: "empty" } });
    expect(state.serverInfo).toBeUndefined();
  });

  it("accumulates the MOTD line by line", () => {
    const state = new ConnectionState();
    state.startMotd("Welcome");
    expect(state.motd).toEqual({ state: "building", text: "Welcome\n" });
    state.appendMotd("line2");
    expect(state.motd).toEqual({ state: "building", text: "Welcome\nline2\n" });
    state.finishMotd("bye");
    expect(state.motd).toEqual({ state: "done", text: "Welcome\nline2\nbye" });
  });

  it("rejects MOTD lines out of order without touching the text", () => {
    const state = new ConnectionState();
    expect(failureOf(() => state.appendMotd("stray"))).toMatchObject({ kind: "ordering" });
    expect(failureOf(() => state.finishMotd("stray"))).toMatchObject({ kind: "ordering" });
    expect(state.motd).toEqual({ state: "empty" });

    state.startMotd("Welcome");
    expect(failureOf(() => state.startMotd("again"))).toMatchObject({ kind: "ordering" });
    expect(state.motd).toEqual({ state: "building", text: "Welcome\n" });

    state.finishMotd("bye");
    expect(failureOf(() => state.appendMotd("late"))).toMatchObject({ kind: "ordering" });
    expect(state.motd).toEqual({ state: "done", text: "Welcome\nbye" });
  });

  it("reports whether the connected transition happened", () => {
    const state = new ConnectionState();
    expect(state.markConnected()).toBe(true);
    expect(state.markConnected()).toBe(false);
    state.markDisconnected();
    expect(state.status).toBe("disconnected");
  });

  it("hands out snapshots that later transitions leave alone", () => {
    const state = new ConnectionState();
    const before = state.snapshot();
    state.markConnected();
    state.startMotd("Welcome");
    expect(before).toEqual({ status: "connecting", motd: { state: "empty" } });
    expect(Object.isFrozen(before)).toBe(true);
    expect(state.snapshot()).toEqual({ status: "connected", motd: { state: "building", text: "Welcome\n" } });
  });
});
