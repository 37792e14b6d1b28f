import { ActivityType, Client, Events, GatewayIntentBits } from "discord.js";
import { createEvent, type Event } from "../../core/event";
import type { BridgeStatus, Outbound } from "../../core/outbound";
import { defaultSleep } from "../../lib/poll";

export interface Connector {
  toEvent(input: DiscordMessageLike): Event;
  sendReply(threadId: string, text: string): Promise<void>;
}

/** The parts of a discord.js Message the bridge reads. */
export interface DiscordMessageLike {
  id: string;
  channelId: string;
  content: string;
  createdTimestamp: number;
  author: {
    id: string;
    username: string;
    globalName?: string | null;
    bot: boolean;
  };
}

export interface DiscordConnectorConfig {
  token: string;
  chunkDelayMs?: number;
  typingIntervalMs?: number;
}

// Discord rejects messages over 2000 characters; keep a margin.
export const DISCORD_CHUNK_SIZE = 1990;

export function toDiscordEvent(message: DiscordMessageLike): Event {
  return createEvent(
    {
      channel: "discord",
      sender: {
        id: message.author.id,
        display: message.author.globalName || message.author.username,
        username: message.author.username,
        is_bot: message.author.bot,
      },
      conversation: {
        thread_id: message.channelId,
      },
      message: {
        id: message.id,
        text: message.content,
      },
    },
    new Date(message.createdTimestamp),
  );
}

/** Splits text into chunks of at most `limit` characters, preferring newline boundaries. */
export function splitMessage(text: string, limit = DISCORD_CHUNK_SIZE): string[] {
  if (text.length <= limit) return [text];
  const chunks: string[] = [];
  let rest = text;
  while (rest.length > limit) {
    let cut = rest.lastIndexOf("\n", limit);
    if (cut <= 0) cut = limit;
    chunks.push(rest.slice(0, cut));
    rest = rest.slice(cut).replace(/^\n/, "");
  }
  if (rest.length > 0) chunks.push(rest);
  return chunks;
}

export class DiscordConnector implements Connector, Outbound {
  private readonly token: string;
  private readonly chunkDelayMs: number;
  private readonly typingIntervalMs: number;
  private readonly client: Client;

  constructor(config: DiscordConnectorConfig) {
    this.token = config.token;
    this.chunkDelayMs = config.chunkDelayMs ?? 500;
    this.typingIntervalMs = config.typingIntervalMs ?? 8_000;
    this.client = new Client({
      intents: [GatewayIntentBits.Guilds, GatewayIntentBits.GuildMessages, GatewayIntentBits.MessageContent],
    });
  }

  toEvent(input: DiscordMessageLike): Event {
    return toDiscordEvent(input);
  }

  /** Logs in and forwards every created message; resolves once the client is ready. */
  start(onEvent: (event: Event) => Promise<void>): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      this.client.once(Events.ClientReady, (readyClient) => {
        console.log(`[discord] logged in as ${readyClient.user.tag} (${readyClient.user.id})`);
        resolve();
      });

      this.client.on(Events.MessageCreate, (message) => {
        onEvent(this.toEvent(message)).catch((error: unknown) => {
          console.error("[discord] error handling message", error);
        });
      });

      this.client.on(Events.Error, (error) => {
        console.error("[discord] client error", error);
      });

      this.client.login(this.token).catch(reject);
    });
  }

  async sendReply(threadId: string, text: string): Promise<void> {
    const channel = await this.client.channels.fetch(threadId);
    if (!channel || !channel.isTextBased() || !("send" in channel)) {
      throw new Error(`discord channel ${threadId} is not a text channel`);
    }
    const chunks = splitMessage(text);
    for (let i = 0; i < chunks.length; i += 1) {
      if (i > 0) await defaultSleep(this.chunkDelayMs);
      await channel.send(chunks[i]);
    }
  }

  startTyping(threadId: string): () => void {
    const pulse = (): void => {
      void this.sendTyping(threadId);
    };
    pulse();
    const timer = setInterval(pulse, this.typingIntervalMs);
    timer.unref();
    return () => clearInterval(timer);
  }

  async setStatus(status: BridgeStatus): Promise<void> {
    const user = this.client.user;
    if (!user) return;
    if (status.state === "online") {
      user.setPresence({ status: "online", activities: [{ name: `with ${status.character}`, type: ActivityType.Playing }] });
    } else {
      user.setPresence({ status: "dnd", activities: [{ name: status.reason, type: ActivityType.Playing }] });
    }
  }

  async stop(): Promise<void> {
    await this.client.destroy();
    console.log("[discord] client destroyed");
  }

  private async sendTyping(threadId: string): Promise<void> {
    try {
      const channel = await this.client.channels.fetch(threadId);
      if (channel && channel.isTextBased() && "sendTyping" in channel) {
        await channel.sendTyping();
      }
    } catch (error) {
      console.warn("[discord] typing indicator failed:", (error as Error).message);
    }
  }
}
