import { readFile, writeFile } from "node:fs/promises";
import path from "node:path";
import { DiscordConnector } from "./connectors/discord/connector";
import { ConversationBridge } from "./core/bridge";
import { openTavernSession } from "./core/browser/launcher";
import { RequestGate } from "./core/request_gate";
import { SessionContext, type SessionOpener } from "./core/session";
import type { Outbound } from "./core/outbound";
import type { Event } from "./core/event";
import { BridgeError } from "./lib/errors";
import { DEFAULT_CONFIG_FILE, parseBridgeConfig, type BridgeConfig } from "./schemas/bridge_config";

/* ── Config ────────────────────────────────────────── */

export interface AppConfig {
    configPath: string;
    discordToken: string;
    bridge: BridgeConfig;
}

export async function loadConfigFile(configPath: string): Promise<BridgeConfig> {
    let raw: string;
    try {
        raw = await readFile(configPath, "utf8");
    } catch (error) {
        if (!isMissingFile(error)) {
            throw new BridgeError("CONFIG_INVALID", `cannot read ${configPath}: ${(error as Error).message}`, { cause: error });
        }
        await writeFile(configPath, `${JSON.stringify(DEFAULT_CONFIG_FILE, null, 4)}\n`, "utf8");
        console.warn(`[config] ${configPath} not found, created a default one`);
        throw new BridgeError("CONFIG_INVALID", `${configPath} was missing; a default one was created. Edit it with your settings and restart.`);
    }
    console.log(`[config] loading ${configPath}`);

    let parsed: unknown;
    try {
        parsed = JSON.parse(raw);
    } catch (error) {
        throw new BridgeError("CONFIG_INVALID", `${configPath} is not valid JSON: ${(error as Error).message}`, { cause: error });
    }
    return parseBridgeConfig(parsed);
}

export async function loadConfig(env: NodeJS.ProcessEnv = process.env): Promise<AppConfig> {
    const discordToken = (env.DISCORD_TOKEN ?? "").trim();
    if (!discordToken) {
        throw new BridgeError("CONFIG_INVALID", "DISCORD_TOKEN is empty. Add it to the environment or a .env file.");
    }
    const configPath = path.resolve(process.cwd(), env.BRIDGE_CONFIG_PATH ?? "config.json");
    return { configPath, discordToken, bridge: await loadConfigFile(configPath) };
}

function isMissingFile(error: unknown): boolean {
    return error instanceof Error && "code" in error && error.code === "ENOENT";
}

/* ── App Builder ────────────────────────────────────── */

export interface AppDeps {
    outbound?: Outbound & { start(onEvent: (event: Event) => Promise<void>): Promise<void>; stop(): Promise<void> };
    open?: SessionOpener;
}

export interface App {
    session: SessionContext;
    bridge: ConversationBridge;
    start(): Promise<void>;
    shutdown(): Promise<void>;
}

export function createApp(config: AppConfig, deps: AppDeps = {}): App {
    const settings = config.bridge;
    const discord = deps.outbound ?? new DiscordConnector({ token: config.discordToken });
    const open: SessionOpener = deps.open ?? (() => openTavernSession({
        url: settings.url,
        driver: settings.driver,
        driverPath: settings.driverPath,
        headless: settings.headless,
    }));

    const session = new SessionContext({
        open,
        initialCharacter: settings.characterName,
        personaMapping: settings.personaMapping,
    });
    const gate = new RequestGate();
    const bridge = new ConversationBridge({
        config: {
            channelId: settings.channelId,
            prefix: settings.commandPrefix,
            usePersonas: settings.usePersonas,
            responseTimeoutSeconds: settings.responseTimeoutSeconds,
            ownerUserIds: settings.ownerUserIds,
        },
        session,
        gate,
        outbound: discord,
    });

    // Browser first: a bridge that cannot reach the web UI must not log in to Discord.
    async function start(): Promise<void> {
        console.log(`[bridge] starting (channel ${settings.channelId}, driver ${settings.driver})`);
        await session.connect();
        await discord.start((event) => bridge.handleEvent(event));
        await discord.setStatus({ state: "online", character: session.currentCharacter });
        console.log("[bridge] ready");
    }

    let isShuttingDown = false;
    async function shutdown(): Promise<void> {
        if (isShuttingDown) return;
        isShuttingDown = true;
        console.log("[bridge] shutting down gracefully…");
        try {
            await discord.stop();
        } catch (error) {
            console.warn("[bridge] discord shutdown failed:", (error as Error).message);
        }
        await session.release();
        console.log("[bridge] shutdown complete");
    }

    return { session, bridge, start, shutdown };
}
