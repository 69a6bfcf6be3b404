import type { EventKey } from "../midi/types";

export interface SessionState {
	/** Clé de périphérique (Control Change) du dernier contrôle capturé */
	lastDeviceKey: EventKey | null;
	/** Observateurs de cellules actifs, par clé affichée */
	watchers: Map<string, () => void>;
}

export function createInitialSession(): SessionState {
	return { lastDeviceKey: null, watchers: new Map() };
}

/** Arrête tous les observateurs de la session. */
export function clearWatchers(s: SessionState): void {
	for (const stop of s.watchers.values()) stop();
	s.watchers.clear();
}
