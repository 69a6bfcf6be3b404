import { logger } from "../logger";
import type { SoundEngine } from "../midi/voices";

/**
 * Moteur sonore factice: journalise les voix et les changements de paramètres.
 * Permet de faire tourner le hub sans synthétiseur branché.
 */
export class ConsoleSoundEngine implements SoundEngine<number> {
  private nextId = 1;
  private readonly live = new Set<number>();

  constructor(readonly name = "console") {}

  instantiate(params: Record<string, number>): number {
    const id = this.nextId++;
    this.live.add(id);
    logger.info(`[${this.name}] voix #${id} ← ${JSON.stringify(params)}`);
    return id;
  }

  setParameter(handle: number, name: string, value: number): void {
    if (!this.live.has(handle)) {
      logger.debug(`[${this.name}] voix #${handle} inconnue, '${name}' ignoré.`);
      return;
    }
    logger.info(`[${this.name}] voix #${handle} ${name}=${value}`);
    // gate=0 termine la voix
    if (name === "gate" && value === 0) this.live.delete(handle);
  }

  /** Paramètre d'instrument (hors voix), ex: depuis un contrôleur CC. */
  setInstrumentParameter(name: string, value: number): void {
    logger.info(`[${this.name}] ${name}=${Number.isInteger(value) ? value : value.toFixed(3)}`);
  }

  liveVoices(): number {
    return this.live.size;
  }
}
