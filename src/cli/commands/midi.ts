import { logger } from "../../logger";
import { formatEventKey } from "../../midi/eventKeys";
import type { CliContext } from "../types";
import type { SessionState } from "../session";

export const midiHandlers = {
	devices(_rest: string[], ctx: CliContext) {
		const devs = ctx.hub.registry.listDevices();
		if (devs.length === 0) { logger.info("Aucun périphérique MIDI attaché."); return; }
		for (const d of devs) logger.info(`${d.name} (vendor=${d.vendor}) [${d.handle}]`);
	},
	scan(_rest: string[], ctx: CliContext) {
		const added = ctx.hub.registry.scanAndAttach();
		logger.info(`Scan terminé: ${added.length} nouveau(x), ${ctx.hub.registry.size} au total.`);
	},
	subs(_rest: string[], ctx: CliContext, _s: SessionState) {
		const subs = ctx.hub.bus.listSubscriptions();
		if (subs.length === 0) { logger.info("Aucun abonnement."); return; }
		for (const s of subs) logger.info(`${s.id} [${s.mode}] ${formatEventKey(s.key)}`);
	},
};
