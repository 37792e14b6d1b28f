export type BridgeStatus =
  | { state: "online"; character: string }
  | { state: "error"; reason: string };

/** What the core needs from the chat platform to answer a channel. */
export interface Outbound {
  sendReply(threadId: string, text: string): Promise<void>;
  /** Starts a typing indicator; the returned function stops it. */
  startTyping(threadId: string): () => void;
  setStatus(status: BridgeStatus): Promise<void>;
}
