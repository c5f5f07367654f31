import { cli } from "cleye";
import { checkCommand } from "./commands/check.ts";
import { compileCommand } from "./commands/compile.ts";
import { playCommand } from "./commands/play.ts";

cli({
  name: "talkgraph",
  version: "0.1.0",
  help: {
    description:
      "talkgraph CLI - check, compile and play branching dialogue scripts",
  },
  commands: [checkCommand, compileCommand, playCommand],
});
