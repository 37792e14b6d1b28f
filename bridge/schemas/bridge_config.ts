import { z } from "zod";
import { BridgeError } from "../lib/errors";
import type { BrowserDriver } from "../core/browser/launcher";

const snowflake = z
    .string({ invalid_type_error: "must be a Discord id written as a string" })
    .regex(/^\d+$/, "must contain only digits");

const driverSchema = z.preprocess(
    (value) => (typeof value === "string" ? value.trim().toLowerCase() : value),
    z.enum(["chrome", "edge", "firefox"]),
);

export const bridgeConfigFileSchema = z
    .object({
        SILLYTAVERN_URL: z.string().url(),
        CHARACTER_NAME: z.string().trim().min(1).optional(),
        DEFAULT_CHARACTER_NAME: z.string().trim().min(1).optional(),
        DISCORD_CHANNEL_ID: snowflake,
        SELENIUM_DRIVER: driverSchema.default("chrome"),
        DRIVER_PATH: z.string().trim().min(1).nullable().default(null),
        RESPONSE_TIMEOUT: z.number().int().positive().default(60),
        USE_PERSONAS: z.boolean().default(false),
        PERSONA_MAPPING: z.record(z.string().trim().min(1)).default({}),
        HEADLESS_BROWSER: z.boolean().default(false),
        COMMAND_PREFIX: z.string().min(1).default("!"),
        OWNER_USER_IDS: z.array(snowflake).default([]),
    })
    .refine((value) => Boolean(value.CHARACTER_NAME ?? value.DEFAULT_CHARACTER_NAME), {
        message: "CHARACTER_NAME is required",
        path: ["CHARACTER_NAME"],
    });

export interface BridgeConfig {
    url: string;
    characterName: string;
    channelId: string;
    driver: BrowserDriver;
    driverPath: string | null;
    responseTimeoutSeconds: number;
    usePersonas: boolean;
    personaMapping: Record<string, string>;
    headless: boolean;
    commandPrefix: string;
    ownerUserIds: string[];
}

/** Written when no config file exists; DISCORD_CHANNEL_ID must be filled in before the bridge starts. */
export const DEFAULT_CONFIG_FILE = {
    SILLYTAVERN_URL: "http://localhost:8000",
    CHARACTER_NAME: "Assistant",
    DISCORD_CHANNEL_ID: null,
    SELENIUM_DRIVER: "chrome",
    DRIVER_PATH: null,
    RESPONSE_TIMEOUT: 60,
    USE_PERSONAS: false,
    PERSONA_MAPPING: {},
    HEADLESS_BROWSER: false,
    COMMAND_PREFIX: "!",
    OWNER_USER_IDS: [],
} as const;

export function parseBridgeConfig(input: unknown): BridgeConfig {
    const result = bridgeConfigFileSchema.safeParse(input);
    if (!result.success) {
        const details = result.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`).join("; ");
        throw new BridgeError("CONFIG_INVALID", `invalid configuration: ${details}`);
    }
    const value = result.data;
    return {
        url: value.SILLYTAVERN_URL,
        characterName: value.CHARACTER_NAME ?? value.DEFAULT_CHARACTER_NAME ?? "",
        channelId: value.DISCORD_CHANNEL_ID,
        driver: value.SELENIUM_DRIVER,
        driverPath: value.DRIVER_PATH,
        responseTimeoutSeconds: value.RESPONSE_TIMEOUT,
        usePersonas: value.USE_PERSONAS,
        personaMapping: value.PERSONA_MAPPING,
        headless: value.HEADLESS_BROWSER,
        commandPrefix: value.COMMAND_PREFIX,
        ownerUserIds: value.OWNER_USER_IDS,
    };
}
