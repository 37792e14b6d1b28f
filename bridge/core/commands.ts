import type { Event } from "./event";
import type { Outbound, BridgeStatus } from "./outbound";
import type { RequestGate } from "./request_gate";
import type { SessionContext } from "./session";
import { logStage } from "./audit/logger";
import { BridgeError, describeForChannel, isBridgeError } from "../lib/errors";

export type CommandName = "help" | "status" | "reconnect" | "character";

export const COMMAND_NAMES: readonly CommandName[] = ["help", "status", "reconnect", "character"];

const ALIASES: Record<string, CommandName> = {
  help: "help",
  status: "status",
  reconnect: "reconnect",
  character: "character",
  st_help: "help",
  st_status: "status",
  st_reconnect: "reconnect",
  st_character: "character",
};

const OWNER_ONLY = new Set<CommandName>(["reconnect", "character"]);

export interface ParsedCommand {
  name: string;
  args: string;
}

/** Splits `<prefix><name> <args>`; null when the text does not start with the prefix. */
export function parseCommand(text: string, prefix: string): ParsedCommand | null {
  if (!prefix || !text.startsWith(prefix)) return null;
  const body = text.slice(prefix.length).trim();
  const match = body.match(/^(\S*)\s*([\s\S]*)$/);
  return {
    name: (match?.[1] ?? "").toLowerCase(),
    args: (match?.[2] ?? "").trim(),
  };
}

export function resolveCommandName(name: string): CommandName | null {
  return Object.hasOwn(ALIASES, name) ? ALIASES[name] : null;
}

export interface CommandInterpreterDeps {
  session: SessionContext;
  gate: RequestGate;
  outbound: Outbound;
  prefix: string;
  usePersonas: boolean;
  ownerUserIds?: readonly string[];
}

export class CommandInterpreter {
  private readonly deps: CommandInterpreterDeps;
  private readonly owners: ReadonlySet<string>;

  constructor(deps: CommandInterpreterDeps) {
    this.deps = deps;
    this.owners = new Set(deps.ownerUserIds ?? []);
  }

  /** Runs the command and posts exactly one reply to the originating channel. */
  async execute(event: Event, command: ParsedCommand): Promise<void> {
    let reply: string;
    try {
      reply = await this.run(event, command);
    } catch (error) {
      logStage(event.trace_id, "error", { command: command.name, error: (error as Error).message });
      console.warn(`[bridge] command ${this.deps.prefix}${command.name} failed:`, (error as Error).message);
      reply = describeForChannel(error, this.deps.prefix);
    }
    await this.deps.outbound.sendReply(event.conversation.thread_id, reply);
    logStage(event.trace_id, "outbound", { length: reply.length });
  }

  async run(event: Event, command: ParsedCommand): Promise<string> {
    const name = resolveCommandName(command.name);
    logStage(event.trace_id, "command", { name: command.name, sender: event.sender.id });
    if (name && OWNER_ONLY.has(name)) this.requireOwner(event, name);

    switch (name) {
      case "help":
        return this.helpText();
      case "status":
        return this.statusText();
      case "reconnect":
        return this.reconnect(event);
      case "character":
        return this.changeCharacter(event, command.args);
      default:
        throw new BridgeError(
          "UNKNOWN_COMMAND",
          `Unknown command \`${this.deps.prefix}${command.name}\`. Valid commands: ${COMMAND_NAMES.map((n) => `\`${this.deps.prefix}${n}\``).join(", ")}.`,
        );
    }
  }

  helpText(): string {
    const p = this.deps.prefix;
    return [
      "**Web UI bridge**",
      "Type in this channel and the message is forwarded to the web UI; the character's reply is posted back here.",
      "",
      "**Commands**",
      `\`${p}help\` - show this message`,
      `\`${p}status\` - connection status and current character`,
      `\`${p}character <name>\` - switch the active character`,
      `\`${p}reconnect\` - restart the browser session`,
    ].join("\n");
  }

  statusText(): string {
    const snapshot = this.deps.session.snapshot();
    const lines = snapshot.connected ? ["✅ Connected to the web UI."] : ["❌ Not connected to the web UI."];
    lines.push(`Current character: \`${snapshot.current_character}\``);
    lines.push(`Persona mode: ${this.deps.usePersonas ? "enabled" : "disabled"}`);
    if (!snapshot.connected && snapshot.last_error) lines.push(`Last error: ${snapshot.last_error}`);
    return lines.join("\n");
  }

  private async reconnect(event: Event): Promise<string> {
    console.log(`[bridge] reconnect requested by ${event.sender.username}`);
    const { session } = this.deps;
    await this.deps.gate.run("a reconnect", async () => {
      try {
        await session.reconnect();
      } catch (error) {
        await this.updateStatus({ state: "error", reason: "Connection Error" });
        throw error;
      }
    });
    await this.updateStatus({ state: "online", character: session.currentCharacter });
    return `✅ Reconnected to the web UI with character \`${session.currentCharacter}\`.`;
  }

  private async changeCharacter(event: Event, name: string): Promise<string> {
    if (!name) return `Usage: \`${this.deps.prefix}character <name>\``;
    console.log(`[bridge] character change to "${name}" requested by ${event.sender.username}`);
    const { session } = this.deps;
    await this.deps.gate.run("a character change", async () => {
      if (!session.connected) {
        throw new BridgeError("SESSION_LOST", `not connected, run \`${this.deps.prefix}reconnect\` first`);
      }
      try {
        await session.selectCharacter(name);
      } catch (error) {
        // drop the dead handle before the gate opens so the next relay reconnects
        if (isBridgeError(error, "SESSION_LOST")) await session.markLost(error.message);
        throw error;
      }
    });
    await this.updateStatus({ state: "online", character: session.currentCharacter });
    return `✅ Active character is now \`${session.currentCharacter}\`.`;
  }

  private requireOwner(event: Event, name: CommandName): void {
    if (this.owners.size === 0 || this.owners.has(event.sender.id)) return;
    throw new BridgeError("NOT_PERMITTED", `\`${this.deps.prefix}${name}\` is restricted to the bot owners.`);
  }

  private async updateStatus(status: BridgeStatus): Promise<void> {
    try {
      await this.deps.outbound.setStatus(status);
    } catch (error) {
      console.warn("[bridge] presence update failed:", (error as Error).message);
    }
  }
}
