export type BridgeErrorCode =
    | "ELEMENT_NOT_FOUND"
    | "SESSION_LOST"
    | "TIMEOUT"
    | "CHARACTER_NOT_FOUND"
    | "RECONNECT_FAILED"
    | "UNKNOWN_COMMAND"
    | "BUSY"
    | "NOT_PERMITTED"
    | "CONFIG_INVALID"
    | "BROWSER_LAUNCH_FAILED";

export class BridgeError extends Error {
    readonly code: BridgeErrorCode;

    constructor(code: BridgeErrorCode, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = "BridgeError";
        this.code = code;
    }
}

export function isBridgeError(error: unknown, code?: BridgeErrorCode): error is BridgeError {
    if (!(error instanceof BridgeError)) return false;
    return code === undefined || error.code === code;
}

export interface PublicError {
    message: string;
    code: string;
}

export function buildPublicError(error: unknown, fallbackMessage: string, fallbackCode: string): PublicError {
    if (error instanceof Error) {
        const message = error.message || fallbackMessage;
        const code = error instanceof BridgeError ? error.code : fallbackCode;
        // Sanitize: avoid leaking internal paths/stack
        const safeMessage = message.length > 300 ? message.slice(0, 300) + "…" : message;
        return { message: safeMessage, code };
    }
    return { message: fallbackMessage, code: fallbackCode };
}

/**
 * Renders a failure as the single chat line posted back to the channel.
 * Unclassified errors fall through to a generic line built by buildPublicError.
 */
export function describeForChannel(error: unknown, prefix = "!"): string {
    if (error instanceof BridgeError) {
        switch (error.code) {
            case "ELEMENT_NOT_FOUND":
                return `⚠️ Could not find the chat controls in the web UI (${error.message}). The page layout may have changed.`;
            case "SESSION_LOST":
                return `⚠️ The browser session was lost (${error.message}). Try \`${prefix}reconnect\`.`;
            case "TIMEOUT":
                return `⌛ ${error.message}`;
            case "CHARACTER_NOT_FOUND":
            case "UNKNOWN_COMMAND":
            case "NOT_PERMITTED":
                return `❌ ${error.message}`;
            case "RECONNECT_FAILED":
                return `❌ ${error.message} Check the logs and configuration.`;
            case "BUSY":
                return `⏳ ${error.message}`;
            default:
                break;
        }
    }
    const publicError = buildPublicError(error, "unexpected failure", "INTERNAL");
    return `❌ Something went wrong talking to the web UI: ${publicError.message}`;
}
