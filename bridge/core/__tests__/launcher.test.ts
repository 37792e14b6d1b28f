import test from "node:test";
import assert from "node:assert/strict";
import { buildLaunchPlan, launchHint } from "../browser/launcher.ts";

test("chrome uses the installed Chrome channel with container-safe flags", () => {
  assert.deepEqual(buildLaunchPlan({ driver: "chrome", driverPath: null, headless: false }), {
    engine: "chromium",
    options: {
      headless: false,
      executablePath: undefined,
      channel: "chrome",
      args: ["--disable-gpu", "--no-sandbox", "--disable-dev-shm-usage"],
    },
  });
});

test("an explicit driver path replaces the channel", () => {
  const plan = buildLaunchPlan({ driver: "edge", driverPath: "/opt/edge/msedge", headless: true });

  assert.equal(plan.engine, "chromium");
  assert.equal(plan.options.executablePath, "/opt/edge/msedge");
  assert.equal(plan.options.channel, undefined);
  assert.deepEqual(plan.options.args, ["--disable-gpu", "--no-sandbox", "--disable-dev-shm-usage", "--window-size=1920,1080"]);
});

test("edge without a path uses the msedge channel", () => {
  assert.equal(buildLaunchPlan({ driver: "edge", driverPath: null, headless: false }).options.channel, "msedge");
});

test("firefox launches the firefox engine", () => {
  assert.deepEqual(buildLaunchPlan({ driver: "firefox", driverPath: null, headless: true }), {
    engine: "firefox",
    options: { headless: true, executablePath: undefined },
  });
});

test("firefox launch failures point at Playwright's Firefox build", () => {
  assert.equal(
    launchHint("firefox"),
    "Firefox needs Playwright's Firefox build; install it and point DRIVER_PATH at that binary, or use chrome or edge.",
  );
  assert.equal(launchHint("chrome"), "Ensure the browser is installed or set DRIVER_PATH.");
});
