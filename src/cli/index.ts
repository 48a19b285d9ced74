import { defineCommand, runMain } from "citty";

const main = defineCommand({
  meta: {
    name: "adaptest",
    version: "0.1.0",
    description: "Adaptest: computerized adaptive testing with 3PL IRT",
  },
  subCommands: {
    init: () => import("./commands/init").then((m) => m.default),
    simulate: () => import("./commands/simulate").then((m) => m.default),
    report: () => import("./commands/report").then((m) => m.default),
    sessions: () => import("./commands/sessions").then((m) => m.default),
  },
});

runMain(main);
