import { errors } from "playwright-core";
import { BridgeError } from "../../lib/errors";
import {
    CHARACTER_DRAWER_TOGGLE,
    CHARACTER_ITEM,
    CHARACTER_NAME,
    GENERATION_INDICATOR,
    MESSAGE_CONTAINER,
    MESSAGE_INPUT,
    MESSAGE_TEXT,
} from "../web_ui/selectors";
import type { ChatMessageSnapshot, TavernPage } from "../web_ui/types";

// How long to wait for the character list to open or an item to accept a click.
const UI_TIMEOUT_MS = 10_000;

/** The locator calls this module makes; a playwright Locator satisfies it. */
export interface ChatLocator {
    count(): Promise<number>;
    first(): ChatLocator;
    fill(value: string): Promise<void>;
    press(key: string): Promise<void>;
    inputValue(): Promise<string>;
    isVisible(): Promise<boolean>;
    click(options?: { timeout?: number }): Promise<void>;
    waitFor(options: { state: "visible"; timeout: number }): Promise<void>;
    filter(options: { has?: ChatLocator }): ChatLocator;
    allTextContents(): Promise<string[]>;
}

/** The slice of a playwright Page this module drives. */
export interface ChatPage {
    isClosed(): boolean;
    locator(selector: string, options?: { hasText?: RegExp }): ChatLocator;
    $$eval(
        selector: string,
        pageFunction: (nodes: Element[], textSelector: string) => ChatMessageSnapshot[],
        arg: string,
    ): Promise<ChatMessageSnapshot[]>;
    readonly keyboard: { press(key: string): Promise<void> };
}

export class PlaywrightTavernPage implements TavernPage {
    private readonly page: ChatPage;

    constructor(page: ChatPage) {
        this.page = page;
    }

    hasInput(): Promise<boolean> {
        return this.guard(async () => (await this.page.locator(MESSAGE_INPUT).count()) > 0);
    }

    typeAndSend(text: string): Promise<void> {
        return this.guard(async () => {
            const input = this.page.locator(MESSAGE_INPUT).first();
            await input.fill(text);
            await input.press("Enter");
        });
    }

    readInput(): Promise<string> {
        return this.guard(() => this.page.locator(MESSAGE_INPUT).first().inputValue());
    }

    clearInput(): Promise<void> {
        return this.guard(() => this.page.locator(MESSAGE_INPUT).first().fill(""));
    }

    listMessages(): Promise<ChatMessageSnapshot[]> {
        return this.guard(() =>
            this.page.$$eval(
                MESSAGE_CONTAINER,
                (nodes, textSelector) =>
                    nodes.map((node, index) => ({
                        id: node.getAttribute("mesid") ?? (node.id || String(index)),
                        author: (node.getAttribute("ch_name") ?? "").trim(),
                        is_user: node.getAttribute("is_user") === "true",
                        text: node.querySelector(textSelector)?.textContent?.trim() ?? "",
                    })),
                MESSAGE_TEXT,
            ),
        );
    }

    isGenerating(): Promise<boolean> {
        return this.guard(() => this.page.locator(GENERATION_INDICATOR).first().isVisible());
    }

    listCharacters(): Promise<string[]> {
        return this.guard(async () => {
            const firstItem = this.page.locator(CHARACTER_ITEM).first();
            if (!(await firstItem.isVisible())) {
                const toggle = this.page.locator(CHARACTER_DRAWER_TOGGLE).first();
                if ((await toggle.count()) === 0) {
                    throw new BridgeError("ELEMENT_NOT_FOUND", `character list toggle ${CHARACTER_DRAWER_TOGGLE} not found`);
                }
                await toggle.click();
                try {
                    await firstItem.waitFor({ state: "visible", timeout: UI_TIMEOUT_MS });
                } catch (error) {
                    if (error instanceof errors.TimeoutError) {
                        throw new BridgeError("ELEMENT_NOT_FOUND", `character list ${CHARACTER_ITEM} did not open`, { cause: error });
                    }
                    throw error;
                }
            }
            const names = await this.page.locator(`${CHARACTER_ITEM} ${CHARACTER_NAME}`).allTextContents();
            return names.map((name) => name.trim());
        });
    }

    openCharacter(name: string): Promise<void> {
        return this.guard(async () => {
            const exactName = new RegExp(`^\\s*${escapeRegExp(name)}\\s*$`);
            const item = this.page
                .locator(CHARACTER_ITEM)
                .filter({ has: this.page.locator(CHARACTER_NAME, { hasText: exactName }) })
                .first();
            await item.click({ timeout: UI_TIMEOUT_MS });
        });
    }

    dismissCharacterList(): Promise<void> {
        return this.guard(() => this.page.keyboard.press("Escape"));
    }

    private async guard<T>(action: () => Promise<T>): Promise<T> {
        if (this.page.isClosed()) {
            throw new BridgeError("SESSION_LOST", "browser page is closed");
        }
        try {
            return await action();
        } catch (error) {
            if (error instanceof BridgeError) throw error;
            if (this.page.isClosed() || isClosedTargetError(error)) {
                throw new BridgeError("SESSION_LOST", "browser page is closed", { cause: error });
            }
            throw error;
        }
    }
}

function isClosedTargetError(error: unknown): boolean {
    return error instanceof Error && /has been closed|target closed|browser has disconnected/i.test(error.message);
}

function escapeRegExp(value: string): string {
    return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}
