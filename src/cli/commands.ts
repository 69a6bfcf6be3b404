import { logger, isLogLevel, setLogLevel, getLogLevel } from "../logger";
import type { CliContext } from "./types";
import type { SessionState } from "./session";
import { midiHandlers } from "./commands/midi";
import { learnHandlers } from "./commands/learn";

export interface CommandHandlers {
	[name: string]: (args: string[], ctx: CliContext, session: SessionState) => Promise<void> | void;
}

/** Aide: une ligne par commande (usage, description). */
export const HELP: ReadonlyArray<readonly [string, string]> = [
	["help", "Afficher cette aide"],
	["devices", "Lister les périphériques MIDI attachés"],
	["scan", "Scanner et attacher les nouveaux périphériques"],
	["learn", "Capturer le prochain Control Change (mémorise le périphérique)"],
	["learn-key", "Capturer la clé de contrôle complète du prochain CC"],
	["watch <cc>", "Observer la dernière valeur d'un CC du périphérique appris"],
	["unwatch", "Arrêter toutes les observations"],
	["subs", "Lister les abonnements du bus"],
	["log <level>", "Changer le niveau de log (error|warn|info|debug|trace)"],
	["clear", "Effacer l'écran"],
	["exit | quit", "Quitter"],
];

export const handlers: CommandHandlers = {
	// MIDI
	devices: midiHandlers.devices,
	scan: midiHandlers.scan,
	subs: midiHandlers.subs,
	// Learn / observation
	learn: learnHandlers.learn,
	"learn-key": learnHandlers["learn-key"],
	watch: learnHandlers.watch,
	unwatch: learnHandlers.unwatch,
	// Misc
	help() {
		const width = Math.max(...HELP.map(([u]) => u.length));
		for (const [usage, desc] of HELP) process.stdout.write(`  ${usage.padEnd(width)}  ${desc}\n`);
	},
	log(rest) {
		const wanted = (rest[0] || "").toLowerCase();
		if (!wanted) { logger.info(`Niveau de log: ${getLogLevel()}`); return; }
		if (!isLogLevel(wanted)) { logger.warn("Usage: log <error|warn|info|debug|trace>"); return; }
		setLogLevel(wanted);
		logger.info(`Niveau de log: ${wanted}`);
	},
	clear() {
		process.stdout.write("\x1B[2J\x1B[3J\x1B[H");
	},
};

/** Commandes de sortie, gérées par la boucle readline. */
export const EXIT_COMMANDS: ReadonlySet<string> = new Set(["exit", "quit"]);

/** Noms de commandes connus (complétion readline). */
export const commandNames = (): string[] => [...Object.keys(handlers), ...EXIT_COMMANDS];

/** Exécute une ligne de commande. Retourne false si la commande est inconnue. */
export async function runCommand(line: string, ctx: CliContext, session: SessionState): Promise<boolean> {
	const [cmd, ...rest] = line.trim().split(/\s+/);
	if (!cmd) return true;
	const handler = Object.prototype.hasOwnProperty.call(handlers, cmd) ? handlers[cmd] : undefined;
	if (!handler) {
		logger.warn(`Commande inconnue '${cmd}'. Tapez 'help'.`);
		return false;
	}
	await handler(rest, ctx, session);
	return true;
}
