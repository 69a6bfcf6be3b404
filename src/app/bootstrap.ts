import type { AppConfig, InstrumentConfig } from "../config";
import { EventBus } from "../events/bus";
import { logger } from "../logger";
import { ControlValueCache } from "../midi/controlCache";
import { InstrumentController, mappingFromConfig } from "../midi/controller";
import type { ControlState } from "../midi/controller";
import type { MidiDeviceSource } from "../midi/devices";
import { MidiDeviceRegistry } from "../midi/registry";
import type { MidiDevice, MidiMessage } from "../midi/types";
import { createPolyPlayer } from "../midi/voices";
import type { PolyVoiceManager, SoundEngine } from "../midi/voices";

/** Moteur d'instrument: voix + paramètres globaux pilotés par CC. */
export interface InstrumentEngine<H> extends SoundEngine<H> {
  setInstrumentParameter(name: string, value: number): void;
}

/**
 * Composants à durée de vie du process, possédés par une seule instance.
 */
export interface MidiHub {
  bus: EventBus<MidiMessage>;
  registry: MidiDeviceRegistry;
  cache: ControlValueCache;
}

/** Crée le bus, le registre de périphériques et le cache ordonné. */
export function createHub(cfg: AppConfig, source: MidiDeviceSource): MidiHub {
  const bus = new EventBus<MidiMessage>();
  const registry = new MidiDeviceRegistry({
    source,
    bus,
    excluded: cfg.midi.excluded_devices,
    pollIntervalMs: cfg.midi.poll_interval_ms,
  });
  const cache = new ControlValueCache(bus, "hub");
  return { bus, registry, cache };
}

/**
 * Applique la section `midi` (démarrage initial et hot reload):
 * scrutation périodique si activée, sinon un scan ponctuel.
 */
export function applyMidiConfig(hub: MidiHub, cfg: AppConfig): void {
  hub.registry.setExcluded(cfg.midi.excluded_devices);
  hub.registry.setPollInterval(cfg.midi.poll_interval_ms);
  if (cfg.midi.poll_enabled) {
    hub.registry.start();
  } else {
    hub.registry.stop();
    hub.registry.scanAndAttach();
  }
}

/** Premier périphérique attaché dont le nom (ou la description) contient le fragment. */
export function findDevice(devices: MidiDevice[], fragment: string): MidiDevice | undefined {
  const needle = fragment.trim().toLowerCase();
  return devices.find((d) => d.name.toLowerCase().includes(needle) || d.description.toLowerCase().includes(needle));
}

export interface AttachedInstrument<H> {
  name: string;
  player: PolyVoiceManager<H> | null;
  controller: InstrumentController | null;
  state: ControlState;
}

/**
 * Branche les instruments configurés (voix polyphoniques et paramètres CC).
 * Un instrument dont le périphérique est absent reste en attente et est branché
 * dès qu'un scan ultérieur (scrutation) l'attache.
 * @returns Instruments attachés (la liste grandit avec les branchements tardifs) et fonction de détachement
 */
export function attachInstruments<H>(
  hub: MidiHub,
  instruments: Record<string, InstrumentConfig>,
  makeEngine: (name: string) => InstrumentEngine<H>
): { attached: AttachedInstrument<H>[]; pending: () => string[]; detach: () => void } {
  const attached: AttachedInstrument<H>[] = [];
  const detachers: Array<() => void> = [];
  const waiting = new Map<string, InstrumentConfig>();

  const attachOne = (name: string, inst: InstrumentConfig, device: MidiDevice | undefined): void => {
    const engine = makeEngine(name);
    const entry: AttachedInstrument<H> = { name, player: null, controller: null, state: new Map() };
    if (inst.play !== false) {
      const { player, detach } = createPolyPlayer(hub.bus, engine, { id: name, device });
      entry.player = player;
      detachers.push(detach);
    }
    const mapping = mappingFromConfig(inst.controls ?? {});
    if (mapping.size > 0) {
      const controller = new InstrumentController({
        bus: hub.bus,
        id: name,
        state: entry.state,
        mapping,
        device,
        handler: (param, value) => engine.setInstrumentParameter(param, value),
      });
      entry.controller = controller;
      detachers.push(() => controller.stop());
    }
    attached.push(entry);
    logger.info(`Instrument '${name}' attaché${device ? ` à '${device.name}'` : ""}.`);
  };

  const tryAttach = (name: string, inst: InstrumentConfig, devices: MidiDevice[]): boolean => {
    if (!inst.device) {
      attachOne(name, inst, undefined);
      return true;
    }
    const device = findDevice(devices, inst.device);
    if (!device) return false;
    attachOne(name, inst, device);
    return true;
  };

  for (const [name, inst] of Object.entries(instruments)) {
    if (!tryAttach(name, inst, hub.registry.listDevices())) {
      logger.warn(`Instrument '${name}': périphérique '${inst.device}' non connecté, en attente.`);
      waiting.set(name, inst);
    }
  }

  const unlisten = hub.registry.onAttached((added) => {
    for (const [name, inst] of Array.from(waiting)) {
      if (tryAttach(name, inst, added)) waiting.delete(name);
    }
  });

  return {
    attached,
    pending: () => Array.from(waiting.keys()),
    detach: () => {
      unlisten();
      waiting.clear();
      for (const d of detachers) d();
    },
  };
}

/** Arrêt ordonné: captures, cellules, scrutation, récepteurs puis abonnements restants. */
export function shutdownHub(hub: MidiHub): void {
  hub.cache.dispose();
  hub.registry.dispose();
  hub.bus.clear();
}
