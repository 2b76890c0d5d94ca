import { IrcError } from "../errors";
import type { ConnectionStatus, IrcContext, MotdState, ServerInfo } from "../types";

const EMPTY_MOTD: MotdState = Object.freeze({ state: "empty" });

export class ConnectionState {
  private currentStatus: ConnectionStatus = "connecting";
  private currentMotd: MotdState = EMPTY_MOTD;
  private info: ServerInfo | undefined;

  get status() {
    return this.currentStatus;
  }

  get motd() {
    return this.currentMotd;
  }

  get serverInfo() {
    return this.info;
  }

  /** Returns false when the status was already connected. */
  markConnected() {
    if (this.currentStatus === "connected") return false;
    this.currentStatus = "connected";
    return true;
  }

  markDisconnected() {
    this.currentStatus = "disconnected";
  }

  startMotd(line: string) {
    if (this.currentMotd.state !== "empty") {
      throw new IrcError("ordering", `MOTD start received while the MOTD is ${this.currentMotd.state}.`);
    }
    this.currentMotd = Object.freeze({ state: "building", text: `${line}\n` });
  }

  appendMotd(line: string) {
    const motd = this.currentMotd;
    if (motd.state !== "building") {
      throw new IrcError("ordering", `MOTD line received while the MOTD is ${motd.state}.`);
    }
    this.currentMotd = Object.freeze({ state: "building", text: `${motd.text}${line}\n` });
  }

  finishMotd(line: string) {
    const motd = this.currentMotd;
    if (motd.state !== "building") {
      throw new IrcError("ordering", `End of MOTD received while the MOTD is ${motd.state}.`);
    }
    this.currentMotd = Object.freeze({ state: "done", text: `${motd.text}${line}` });
  }

  setServerInfo(info: ServerInfo) {
    this.info = Object.freeze({ ...info });
  }

  snapshot(): IrcContext {
    return Object.freeze({ status: this.currentStatus, motd: this.currentMotd });
  }
}
