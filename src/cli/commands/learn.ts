import { logger } from "../../logger";
import { CaptureTimeoutError } from "../../midi/controlCache";
import { formatEventKey } from "../../midi/eventKeys";
import type { CliContext } from "../types";
import type { SessionState } from "../session";
import { clearWatchers } from "../session";

function timeoutOf(ctx: CliContext): number | undefined {
	const ms = ctx.getConfig().capture.timeout_ms;
	return ms > 0 ? ms : undefined;
}

async function capture<T>(run: () => Promise<T>): Promise<T | null> {
	try {
		return await run();
	} catch (err) {
		if (err instanceof CaptureTimeoutError) { logger.warn(`Learn: ${err.message}.`); return null; }
		throw err;
	}
}

export const learnHandlers = {
	async learn(_rest: string[], ctx: CliContext, s: SessionState) {
		logger.info("Learn armé. Manipulez un contrôle…");
		const res = await capture(() => ctx.hub.cache.captureNext({ includeKey: true, timeoutMs: timeoutOf(ctx) }));
		if (!res) return;
		s.lastDeviceKey = res.key ?? null;
		logger.info(`LEARN → cc=${res.controller} val=${res.value}`);
		if (res.key) logger.info("Clé:", formatEventKey(res.key));
	},
	async "learn-key"(_rest: string[], ctx: CliContext, s: SessionState) {
		logger.info("Learn armé (clé de contrôle). Manipulez un contrôle…");
		const key = await capture(() => ctx.hub.cache.captureNextControlSpecificKey({ timeoutMs: timeoutOf(ctx) }));
		if (!key) return;
		s.lastDeviceKey = key.slice(0, -1);
		logger.info("Clé de contrôle:", formatEventKey(key));
	},
	watch(rest: string[], ctx: CliContext, s: SessionState) {
		const cc = Number(rest[0]);
		if (!Number.isInteger(cc) || cc < 0 || cc > 127) { logger.warn("Usage: watch <cc 0..127>"); return; }
		if (!s.lastDeviceKey) { logger.warn("Aucun périphérique appris. Utilisez 'learn' d'abord."); return; }
		const key = [...s.lastDeviceKey, cc];
		const label = formatEventKey(key);
		if (s.watchers.has(label)) { logger.info(`Déjà observé: ${label}`); return; }
		const cell = ctx.hub.cache.latestFor(key);
		const stop = cell.watch((u) => logger.info(`${label} = ${u.value}`));
		s.watchers.set(label, stop);
		logger.info(`Observation de ${label} (valeur courante: ${cell.value}).`);
	},
	unwatch(_rest: string[], _ctx: CliContext, s: SessionState) {
		const n = s.watchers.size;
		clearWatchers(s);
		logger.info(`${n} observation(s) arrêtée(s).`);
	},
};
