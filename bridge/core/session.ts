import { BridgeError, isBridgeError } from "../lib/errors";
import { defaultSleep } from "../lib/poll";
import type { WebUiAdapter } from "./web_ui/types";

/** One live browser connection to the web UI. */
export interface OpenSession {
  adapter: WebUiAdapter;
  close(): Promise<void>;
}

export type SessionOpener = () => Promise<OpenSession>;

export interface SessionContextOptions {
  open: SessionOpener;
  initialCharacter: string;
  personaMapping?: Record<string, string>;
  reconnectDelayMs?: number;
  sleep?: (ms: number) => Promise<void>;
}

export type SessionSnapshot = {
  connected: boolean;
  current_character: string;
  connected_at: string | null;
  last_error: string | null;
};

/**
 * Process-wide session state: the browser handle, the active character and
 * the persona mapping. The handle is exclusively owned here; release() detaches
 * it before closing so it is closed at most once and never reused.
 */
export class SessionContext {
  readonly personaMapping: ReadonlyMap<string, string>;
  private readonly open: SessionOpener;
  private readonly reconnectDelayMs: number;
  private readonly sleep: (ms: number) => Promise<void>;
  private live: OpenSession | null = null;
  private character: string;
  private connectedAt: string | null = null;
  private lastError: string | null = null;

  constructor(options: SessionContextOptions) {
    this.open = options.open;
    this.character = options.initialCharacter;
    this.personaMapping = new Map(Object.entries(options.personaMapping ?? {}));
    this.reconnectDelayMs = Math.max(0, Math.floor(options.reconnectDelayMs ?? 1_000));
    this.sleep = options.sleep ?? defaultSleep;
  }

  get connected(): boolean {
    return this.live !== null;
  }

  get currentCharacter(): string {
    return this.character;
  }

  /** Persona for a Discord user, falling back to their raw username. */
  resolvePersona(userId: string, username: string): string {
    return this.personaMapping.get(userId) ?? username;
  }

  adapter(): WebUiAdapter {
    if (!this.live) {
      throw new BridgeError("SESSION_LOST", "no live browser session");
    }
    return this.live.adapter;
  }

  /** Opens a session and selects the current character. No-op when already connected. */
  async connect(): Promise<void> {
    if (this.live) return;
    const opened = await this.open();
    try {
      await opened.adapter.setCharacter(this.character);
    } catch (error) {
      await closeQuietly(opened);
      this.lastError = (error as Error).message;
      throw error;
    }
    this.live = opened;
    this.connectedAt = new Date().toISOString();
    this.lastError = null;
    console.log(`[session] connected with character "${this.character}"`);
  }

  async ensureConnected(): Promise<WebUiAdapter> {
    if (!this.live) {
      console.warn("[session] no live session, reconnecting before relay");
      try {
        await this.connect();
      } catch (error) {
        throw new BridgeError("SESSION_LOST", `could not reconnect to the web UI: ${(error as Error).message}`, { cause: error });
      }
    }
    return this.adapter();
  }

  async selectCharacter(name: string): Promise<void> {
    await this.adapter().setCharacter(name);
    this.character = name;
    console.log(`[session] character switched to "${name}"`);
  }

  /** Releases the old handle, then opens a fresh one. */
  async reconnect(): Promise<void> {
    await this.release();
    if (this.reconnectDelayMs > 0) await this.sleep(this.reconnectDelayMs);
    try {
      await this.connect();
    } catch (error) {
      if (isBridgeError(error, "RECONNECT_FAILED")) throw error;
      this.lastError = (error as Error).message;
      throw new BridgeError("RECONNECT_FAILED", "Failed to reconnect to the web UI.", { cause: error });
    }
  }

  /** Drops the handle after a SessionLost so the next relay reconnects. */
  async markLost(reason: string): Promise<void> {
    this.lastError = reason;
    await this.release();
  }

  async release(): Promise<void> {
    const current = this.live;
    if (!current) return;
    this.live = null;
    this.connectedAt = null;
    await closeQuietly(current);
    console.log("[session] browser session released");
  }

  snapshot(): SessionSnapshot {
    return {
      connected: this.connected,
      current_character: this.character,
      connected_at: this.connectedAt,
      last_error: this.lastError,
    };
  }
}

async function closeQuietly(session: OpenSession): Promise<void> {
  try {
    await session.close();
  } catch (error) {
    console.warn("[session] error while closing browser:", (error as Error).message);
  }
}
