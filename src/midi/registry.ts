import { logger } from "../logger";
import type { EventBus } from "../events/bus";
import { decodeMidi, formatMessage, hex } from "./decoder";
import { commandKey, controlKey, deviceKey } from "./eventKeys";
import type { MidiDeviceSource, MidiReceiver } from "./devices";
import type { MidiDevice, MidiMessage } from "./types";

/** Bus transportant les messages MIDI décodés. */
export type MidiEventBus = EventBus<MidiMessage>;

/** Pseudo‑périphériques logiciels jamais attachés (synthés virtuels, ports de bouclage). */
export const DEFAULT_EXCLUDED_DEVICES: readonly string[] = [
  "Real Time Sequencer",
  "Java Sound Synthesizer",
  "Midi Through",
];

/** Période de re-scan des périphériques (ms). */
export const DEFAULT_POLL_INTERVAL_MS = 2000;

/**
 * Publie un message aux trois granularités: commande, périphérique, puis contrôle
 * (identifiant primaire = data1).
 */
export function publishMidiMessage(bus: MidiEventBus, msg: MidiMessage): void {
  bus.publish(commandKey(msg.command), msg);
  bus.publish(deviceKey(msg.device, msg.command), msg);
  bus.publish(controlKey(msg.device, msg.command, msg.data1), msg);
}

export interface DeviceRegistryOptions {
  source: MidiDeviceSource;
  bus: MidiEventBus;
  /** Noms (ou vendeurs) exclus; défaut: {@link DEFAULT_EXCLUDED_DEVICES} */
  excluded?: Iterable<string>;
  pollIntervalMs?: number;
}

interface AttachedDevice {
  device: MidiDevice;
  receiver: MidiReceiver;
}

/**
 * Registre des périphériques d'entrée et scrutateur périodique.
 *
 * Invariants:
 * - Un périphérique (par `handle`) est attaché au plus une fois
 * - Un scan n'enlève jamais d'entrée; seul `dispose()` vide le registre
 * - Les scans ne se chevauchent pas: le suivant n'est planifié qu'au retour du précédent
 */
export class MidiDeviceRegistry {
  private readonly devices = new Map<string, AttachedDevice>();
  private readonly source: MidiDeviceSource;
  private readonly bus: MidiEventBus;
  private excluded: Set<string>;
  private pollIntervalMs: number;
  private timer: NodeJS.Timeout | null = null;
  private running = false;
  private readonly attachListeners = new Set<(added: MidiDevice[]) => void>();

  constructor(opts: DeviceRegistryOptions) {
    this.source = opts.source;
    this.bus = opts.bus;
    this.excluded = new Set(opts.excluded ?? DEFAULT_EXCLUDED_DEVICES);
    this.pollIntervalMs = opts.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
  }

  /**
   * Découvre les nouveaux périphériques et installe un récepteur sur chacun.
   * Un échec d'ouverture n'exclut que le périphérique concerné; un échec de la
   * découverte elle-même rend le scan sans effet.
   * @returns Périphériques attachés lors de ce scan
   */
  scanAndAttach(): MidiDevice[] {
    try {
      const candidates = this.source
        .listAvailableInputDevices()
        .filter((d) => !this.isExcluded(d) && !this.devices.has(d.handle));
      const attached = new Map<string, AttachedDevice>();
      for (const device of candidates) {
        if (attached.has(device.handle)) continue;
        try {
          const receiver = this.source.openReceiver(device);
          receiver.onMessage((raw, ts) => this.onRaw(device, raw, ts));
          attached.set(device.handle, { device, receiver });
        } catch (err) {
          logger.warn(`Impossible d'écouter le périphérique MIDI '${device.name}' (${device.handle}):`, err);
        }
      }
      for (const [handle, entry] of attached) this.devices.set(handle, entry);
      const added = Array.from(attached.values(), (a) => a.device);
      if (added.length > 0) {
        logger.info(`${added.length} périphérique(s) MIDI connecté(s): ${added.map((d) => d.name).join(", ")}`);
        this.notifyAttached(added);
      }
      return added;
    } catch (err) {
      logger.error("Détection des périphériques MIDI en échec:", err);
      return [];
    }
  }

  /**
   * Notifié après chaque scan ayant attaché au moins un périphérique.
   * @returns Fonction de désabonnement
   */
  onAttached(listener: (added: MidiDevice[]) => void): () => void {
    this.attachListeners.add(listener);
    return () => {
      this.attachListeners.delete(listener);
    };
  }

  private notifyAttached(added: MidiDevice[]): void {
    for (const l of Array.from(this.attachListeners)) {
      try {
        l(added);
      } catch (err) {
        logger.warn("Listener de connexion MIDI en erreur:", err);
      }
    }
  }

  /** Lance un scan immédiat puis un scan toutes les `pollIntervalMs`. */
  start(): void {
    if (this.running) return;
    this.running = true;
    logger.info(`Scrutation MIDI active (${this.pollIntervalMs}ms).`);
    this.tick();
  }

  /** Arrête la scrutation périodique; les récepteurs restent ouverts. */
  stop(): void {
    this.running = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }

  isPolling(): boolean {
    return this.running;
  }

  /** Modifie la période; prise en compte au prochain tick. */
  setPollInterval(ms: number): void {
    this.pollIntervalMs = ms;
  }

  /** Remplace la liste d'exclusion; les périphériques déjà attachés sont conservés. */
  setExcluded(names: Iterable<string>): void {
    this.excluded = new Set(names);
  }

  listDevices(): MidiDevice[] {
    return Array.from(this.devices.values(), (a) => a.device);
  }

  has(handle: string): boolean {
    return this.devices.has(handle);
  }

  get size(): number {
    return this.devices.size;
  }

  /** Arrête la scrutation, ferme tous les récepteurs et vide le registre. */
  dispose(): void {
    this.stop();
    for (const { device, receiver } of this.devices.values()) {
      try {
        receiver.close();
      } catch (err) {
        logger.debug(`Fermeture du récepteur '${device.handle}' échouée:`, err);
      }
    }
    this.devices.clear();
    this.attachListeners.clear();
  }

  private isExcluded(d: MidiDevice): boolean {
    return this.excluded.has(d.name) || this.excluded.has(d.vendor);
  }

  private tick(): void {
    this.timer = null;
    this.scanAndAttach();
    if (this.running) {
      this.timer = setTimeout(() => this.tick(), this.pollIntervalMs);
    }
  }

  private onRaw(device: MidiDevice, raw: number[], timestamp: number): void {
    const msg = decodeMidi(raw, device, timestamp);
    if (!msg) {
      logger.trace(`MIDI ignoré <- ${device.name}: [${hex(raw)}]`);
      return;
    }
    logger.debug(`MIDI <- ${device.name}: ${formatMessage(msg)} [${hex(raw)}]`);
    try {
      publishMidiMessage(this.bus, msg);
    } catch (err) {
      logger.warn(`Publication MIDI échouée (${device.name}):`, err);
    }
  }
}
