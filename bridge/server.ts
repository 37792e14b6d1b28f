import "dotenv/config";
import { createApp, loadConfig, type App } from "./create_app";
import { buildPublicError } from "./lib/errors";

async function main(): Promise<void> {
  let app: App;
  try {
    app = createApp(await loadConfig());
  } catch (error) {
    const publicError = buildPublicError(error, "startup failed", "STARTUP_FAILED");
    console.error(`[bridge] ${publicError.code}: ${publicError.message}`);
    process.exit(1);
  }

  const stop = (signal: string): void => {
    console.log(`[bridge] ${signal} received`);
    app.shutdown().then(
      () => process.exit(0),
      (error: unknown) => {
        console.error("[bridge] shutdown failed", error);
        process.exit(1);
      },
    );
  };
  process.on("SIGINT", () => stop("SIGINT"));
  process.on("SIGTERM", () => stop("SIGTERM"));

  try {
    await app.start();
  } catch (error) {
    const publicError = buildPublicError(error, "startup failed", "STARTUP_FAILED");
    console.error(`[bridge] ${publicError.code}: ${publicError.message}`);
    await app.shutdown();
    process.exit(1);
  }
}

main().catch((error: unknown) => {
  console.error("[bridge] fatal error", error);
  process.exit(1);
});
