import type { Event } from "./event";
import type { Outbound } from "./outbound";
import type { RequestGate } from "./request_gate";
import type { SessionContext } from "./session";
import { CommandInterpreter, parseCommand } from "./commands";
import { logStage, preview } from "./audit/logger";
import { describeForChannel, isBridgeError } from "../lib/errors";

export const EMPTY_REPLY_NOTICE = "*Received an empty response from the web UI.*";
export const BLANK_MESSAGE_NOTICE = "*Nothing to relay: the message has no text.*";

export interface ConversationBridgeConfig {
  channelId: string;
  prefix: string;
  usePersonas: boolean;
  responseTimeoutSeconds: number;
  ownerUserIds?: readonly string[];
}

export class ConversationBridge {
  private readonly config: ConversationBridgeConfig;
  private readonly session: SessionContext;
  private readonly gate: RequestGate;
  private readonly outbound: Outbound;
  private readonly commands: CommandInterpreter;

  constructor(deps: { config: ConversationBridgeConfig; session: SessionContext; gate: RequestGate; outbound: Outbound }) {
    this.config = deps.config;
    this.session = deps.session;
    this.gate = deps.gate;
    this.outbound = deps.outbound;
    this.commands = new CommandInterpreter({
      session: deps.session,
      gate: deps.gate,
      outbound: deps.outbound,
      prefix: deps.config.prefix,
      usePersonas: deps.config.usePersonas,
      ownerUserIds: deps.config.ownerUserIds,
    });
  }

  /** True when the event belongs to the bridged channel and is not from a bot. */
  accepts(event: Event): boolean {
    return event.conversation.thread_id === this.config.channelId && !event.sender.is_bot;
  }

  async handleEvent(event: Event): Promise<void> {
    if (!this.accepts(event)) return;
    logStage(event.trace_id, "event", { sender: event.sender.id, message_id: event.message.id });

    const command = parseCommand(event.message.text, this.config.prefix);
    if (command) {
      await this.commands.execute(event, command);
      return;
    }
    if (!event.message.text.trim()) {
      // attachment-only or whitespace messages are not forwarded
      await this.outbound.sendReply(event.conversation.thread_id, BLANK_MESSAGE_NOTICE);
      logStage(event.trace_id, "outbound", { length: BLANK_MESSAGE_NOTICE.length, blank: true });
      return;
    }

    console.log(`[bridge] message from ${event.sender.username}: '${preview(event.message.text)}'`);
    const stopTyping = this.outbound.startTyping(event.conversation.thread_id);
    let reply: string;
    try {
      const text = await this.gate.run("another message", () => this.relay(event));
      reply = text || EMPTY_REPLY_NOTICE;
    } catch (error) {
      reply = this.handleRelayError(event, error);
    } finally {
      stopTyping();
    }
    await this.outbound.sendReply(event.conversation.thread_id, reply);
    logStage(event.trace_id, "outbound", { length: reply.length });
  }

  private async relay(event: Event): Promise<string> {
    try {
      return await this.relayOnce(event);
    } catch (error) {
      // release inside the gate so no other cycle picks up the dead handle
      if (isBridgeError(error, "SESSION_LOST")) await this.session.markLost(error.message);
      throw error;
    }
  }

  private async relayOnce(event: Event): Promise<string> {
    const adapter = await this.session.ensureConnected();
    if (this.config.usePersonas) {
      const persona = this.session.resolvePersona(event.sender.id, event.sender.username);
      logStage(event.trace_id, "persona", { persona });
      await adapter.setPersona(persona);
    }
    logStage(event.trace_id, "submit", { length: event.message.text.length });
    await adapter.submit(event.message.text);
    const reply = await adapter.awaitResponse(this.config.responseTimeoutSeconds);
    logStage(event.trace_id, "response", { length: reply.length });
    console.log(`[bridge] reply received: '${preview(reply)}'`);
    return reply;
  }

  private handleRelayError(event: Event, error: unknown): string {
    logStage(event.trace_id, "error", { error: (error as Error).message, code: isBridgeError(error) ? error.code : "INTERNAL" });
    if (isBridgeError(error, "BUSY") || isBridgeError(error, "TIMEOUT")) {
      console.warn(`[bridge] ${error.message}`);
    } else {
      console.error("[bridge] relay failed", error);
    }
    return describeForChannel(error, this.config.prefix);
  }
}
