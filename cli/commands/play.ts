import { command } from "cleye";
import readline from "node:readline/promises";
import { TalkDirector } from "../../director/director.ts";
import { compile } from "../../graph/compiler.ts";
import { Logger, type LogSink } from "../../log/logger.ts";
import {
  createStyler,
  formatErrors,
  renderChoices,
  renderDiagnostics,
  speakerOf,
  type Styler,
} from "../format.ts";
import { loadScriptFile } from "../io.ts";

export type TurnOutcome = "continue" | "end" | "quit";

/** A director whose callbacks print every reached line to `out`. */
export function createPlayer(
  out: LogSink,
  style: Styler,
  logger?: Logger,
): TalkDirector {
  const cast = (talkers: { name: string }[]) =>
    talkers.map((t) => t.name).join(", ");

  return new TalkDirector({
    logger,
    callbacks: {
      onText: (_, event) =>
        out.log(`${style("bold", speakerOf(event.talkers))}: ${event.text}`),
      onChoices: (_, event) => {
        out.log(`${style("bold", speakerOf(event.talkers))}: ${event.text}`);
        for (const line of renderChoices(event.choices)) {
          out.log(`  ${line}`);
        }
      },
      onEnter: (_, event) =>
        out.log(style("dim", `--- ${cast(event.talkers)} enters the scene.`)),
      onExit: (_, event) =>
        out.log(style("dim", `--- ${cast(event.talkers)} exits the scene.`)),
      onError: (_, error) => {
        if (error.kind !== "no_next_action") {
          out.error(style("red", error.message));
        }
      },
    },
  });
}

/**
 * Applies one line of player input: `q` quits, a number picks a choice on a
 * choice line, anything else advances.
 */
export function playTurn(
  player: TalkDirector,
  talk: string,
  answer: string,
  out: LogSink,
  style: Styler,
): TurnOutcome {
  const input = answer.trim();
  if (input === "q") return "quit";

  const choices = player.get(talk)?.currentChoices();
  if (choices) {
    const choice = choices[Number(input) - 1];
    if (!choice) {
      out.log(`Pick a number between 1 and ${choices.length}.`);
      return "continue";
    }
    player.handle({ type: "jump", talk, target: choice.next });
    return "continue";
  }

  const result = player.handle({ type: "next", talk });
  if (!result.valid && result.error.kind === "no_next_action") {
    out.log(style("green", "The end."));
    return "end";
  }
  return "continue";
}

export const playCommand = command(
  {
    name: "play",

    help: {
      description:
        "Launch interactive simulator to play through a dialogue script",
    },

    parameters: ["<file>"],

    flags: {
      start: {
        type: Number,
        alias: "s",
        description: "Begin the simulation at the given line id",
      },
      verbose: {
        type: Boolean,
        alias: "v",
        description: "Log every request and the line it reaches",
        default: false,
      },
      noColor: {
        type: Boolean,
        description: "Disable colorized text output",
        default: false,
      },
    },
  },
  async (argv) => {
    const file = argv._.file;
    const { start, verbose, noColor } = argv.flags;
    const style = createStyler(noColor);

    const loadResult = await loadScriptFile(file);
    const compileResult = loadResult.value
      ? compile(loadResult.value, {
          logger: new Logger("compiler", { enabled: verbose }),
        })
      : null;
    if (compileResult === null || !compileResult.valid) {
      const errors =
        compileResult === null ? loadResult.errors : [compileResult.error];
      for (const line of renderDiagnostics(formatErrors(errors), file, style)) {
        console.error(line);
      }
      process.exitCode = 1;
      return;
    }

    const player = createPlayer(
      console,
      style,
      new Logger("director", { enabled: verbose }),
    );
    player.add(file, compileResult.value);

    const opening = player.handle(
      start === undefined
        ? { type: "refire", talk: file }
        : { type: "jump", talk: file, target: start },
    );
    if (!opening.valid) {
      process.exitCode = 1;
      return;
    }

    console.log(
      style(
        "dim",
        "Press Enter to advance, a number to pick a choice, q to quit.",
      ),
    );

    const rl = readline.createInterface({
      input: process.stdin,
      output: process.stdout,
    });

    try {
      let outcome: TurnOutcome = "continue";
      while (outcome === "continue") {
        const answer = await rl.question("> ");
        outcome = playTurn(player, file, answer, console, style);
      }
    } finally {
      rl.close();
    }
  },
);
