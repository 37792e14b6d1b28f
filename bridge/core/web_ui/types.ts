/** One rendered chat message as read from the page. */
export interface ChatMessageSnapshot {
    id: string;
    author: string;
    is_user: boolean;
    text: string;
}

/**
 * DOM-level operations on the target chat page. Implementations throw
 * BridgeError("SESSION_LOST") once the page or browser is gone.
 */
export interface TavernPage {
    hasInput(): Promise<boolean>;
    typeAndSend(text: string): Promise<void>;
    readInput(): Promise<string>;
    clearInput(): Promise<void>;
    listMessages(): Promise<ChatMessageSnapshot[]>;
    isGenerating(): Promise<boolean>;
    /** Opens the character list and returns the visible names in page order. */
    listCharacters(): Promise<string[]>;
    openCharacter(name: string): Promise<void>;
    dismissCharacterList(): Promise<void>;
}

/** Conversation capability the bridge drives; tests substitute a fake. */
export interface WebUiAdapter {
    submit(text: string): Promise<void>;
    awaitResponse(timeoutSeconds: number): Promise<string>;
    setCharacter(name: string): Promise<void>;
    setPersona(name: string): Promise<void>;
}
