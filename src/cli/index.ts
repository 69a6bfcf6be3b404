import readline from "readline";
import { logger } from "../logger";
import { EXIT_COMMANDS, commandNames, runCommand } from "./commands";
import { clearWatchers, createInitialSession } from "./session";
import type { CliContext } from "./types";

export type { CliContext } from "./types";

/** La CLI n'est attachée que sur un terminal interactif, sauf si MIDI_HUB_DISABLE_CLI est positionnée. */
export function shouldAttachCli(env: NodeJS.ProcessEnv = process.env, isTTY = Boolean(process.stdin.isTTY)): boolean {
  const disabled = (env.MIDI_HUB_DISABLE_CLI || "").trim().toLowerCase();
  if (disabled === "1" || disabled === "true" || disabled === "yes") return false;
  return isTTY;
}

/**
 * Attache une CLI readline (commandes: help, devices, learn, watch…).
 * @returns Fonction de détachement
 */
export function attachCli(ctx: CliContext): () => void {
  const session = createInitialSession();
  const completer = (line: string): [string[], string] => {
    const hits = commandNames().filter((c) => c.startsWith(line.trim()));
    return [hits.length ? hits : commandNames(), line];
  };
  const rl = readline.createInterface({ input: process.stdin, output: process.stdout, completer });

  rl.setPrompt("midi> ");
  rl.prompt();

  const handleLine = async (line: string): Promise<void> => {
    const cmd = line.trim().split(/\s+/)[0] || "";
    if (EXIT_COMMANDS.has(cmd)) {
      rl.close();
      return;
    }
    try {
      await runCommand(line, ctx, session);
    } catch (err) {
      logger.error("Erreur CLI:", err);
    } finally {
      rl.prompt();
    }
  };

  rl.on("line", (line) => {
    void handleLine(line);
  });

  rl.on("close", () => {
    clearWatchers(session);
    Promise.resolve(ctx.onExit?.()).catch((err) => logger.error("Erreur à la sortie:", err));
  });

  return () => {
    rl.close();
  };
}
