import { runRegistered } from "./helpers/runner.js";

// Register tests (side-effect imports)
await import("./classifier.spec.js");
await import("./forecast.spec.js");
await import("./cityName.spec.js");
await import("./locales.spec.js");
await import("./formatter.spec.js");
await import("./sessions.spec.js");
await import("./config.spec.js");
await import("./logging.spec.js");
await import("./userQueue.spec.js");
await import("./openweather.spec.js");
await import("./engine.spec.js");
await import("./flow.spec.js");

await runRegistered();
