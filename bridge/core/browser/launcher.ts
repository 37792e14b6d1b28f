import { chromium, firefox, type Browser, type LaunchOptions } from "playwright-core";
import { BridgeError } from "../../lib/errors";
import type { OpenSession } from "../session";
import { MESSAGE_INPUT } from "../web_ui/selectors";
import { TavernWebUiAdapter } from "../web_ui/tavern_adapter";
import { PlaywrightTavernPage } from "./playwright_page";

export type BrowserDriver = "chrome" | "edge" | "firefox";

export interface BrowserLaunchConfig {
  driver: BrowserDriver;
  driverPath: string | null;
  headless: boolean;
}

export interface TavernSessionConfig extends BrowserLaunchConfig {
  url: string;
}

const CHROMIUM_ARGS = ["--disable-gpu", "--no-sandbox", "--disable-dev-shm-usage"];
const HEADLESS_VIEWPORT = { width: 1920, height: 1080 };
const PAGE_LOAD_TIMEOUT_MS = 30_000;

export function buildLaunchPlan(config: BrowserLaunchConfig): { engine: "chromium" | "firefox"; options: LaunchOptions } {
  const executablePath = config.driverPath ?? undefined;
  const args = config.headless ? [`--window-size=${HEADLESS_VIEWPORT.width},${HEADLESS_VIEWPORT.height}`] : [];
  switch (config.driver) {
    case "chrome":
      return {
        engine: "chromium",
        options: { headless: config.headless, executablePath, channel: executablePath ? undefined : "chrome", args: [...CHROMIUM_ARGS, ...args] },
      };
    case "edge":
      return {
        engine: "chromium",
        options: { headless: config.headless, executablePath, channel: executablePath ? undefined : "msedge", args: [...CHROMIUM_ARGS, ...args] },
      };
    case "firefox":
      return { engine: "firefox", options: { headless: config.headless, executablePath } };
    default:
      throw new BridgeError("CONFIG_INVALID", `unsupported browser driver: ${String(config.driver)}`);
  }
}

/** Operator advice appended to a launch failure. */
export function launchHint(driver: BrowserDriver): string {
  if (driver === "firefox") {
    // playwright only speaks to its own patched Firefox, never a stock install
    return "Firefox needs Playwright's Firefox build; install it and point DRIVER_PATH at that binary, or use chrome or edge.";
  }
  return "Ensure the browser is installed or set DRIVER_PATH.";
}

export async function launchBrowser(config: BrowserLaunchConfig): Promise<Browser> {
  const plan = buildLaunchPlan(config);
  console.log(`[session] launching ${config.driver} (headless: ${config.headless})`);
  try {
    return plan.engine === "firefox" ? await firefox.launch(plan.options) : await chromium.launch(plan.options);
  } catch (error) {
    throw new BridgeError(
      "BROWSER_LAUNCH_FAILED",
      `${config.driver} launch failed: ${(error as Error).message}. ${launchHint(config.driver)}`,
      { cause: error },
    );
  }
}

/** Launches a browser, opens the web UI and waits for its chat input. */
export async function openTavernSession(config: TavernSessionConfig): Promise<OpenSession> {
  const browser = await launchBrowser(config);
  try {
    const context = await browser.newContext(config.headless ? { viewport: HEADLESS_VIEWPORT } : {});
    const page = await context.newPage();
    console.log(`[session] navigating to ${config.url}`);
    await page.goto(config.url, { waitUntil: "domcontentloaded", timeout: PAGE_LOAD_TIMEOUT_MS });
    await page.waitForSelector(MESSAGE_INPUT, { timeout: PAGE_LOAD_TIMEOUT_MS });
    console.log("[session] web UI loaded");
    const adapter = new TavernWebUiAdapter(new PlaywrightTavernPage(page));
    return { adapter, close: () => browser.close() };
  } catch (error) {
    await browser.close().catch((closeError: unknown) => {
      console.warn("[session] error while closing browser:", (closeError as Error).message);
    });
    throw new BridgeError("SESSION_LOST", `web UI did not load at ${config.url}: ${(error as Error).message}`, { cause: error });
  }
}
