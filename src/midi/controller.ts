import { logger } from "../logger";
import { subscriptionId } from "../events/bus";
import { commandKey, deviceKey } from "./eventKeys";
import type { MidiEventBus } from "./registry";
import type { ControlChangeMessage, MidiDevice, MidiMessage } from "./types";

/** Paramètre d'instrument piloté par un contrôleur. */
export interface ControlBinding {
  name: string;
  /** Conversion de la valeur brute 0..127 vers la valeur sémantique. */
  scale: (raw: number) => number;
}

/** Table contrôleur brut → paramètre. Immuable pour la durée d'un tracker. */
export type ControlMapping = ReadonlyMap<number, ControlBinding>;

/** Dernière valeur appliquée par nom de paramètre. */
export type ControlState = Map<string, number>;

export type ControlHandler = (name: string, value: number) => void;

/** Déclaration d'un contrôle en configuration (`instruments.<nom>.controls`). */
export interface ControlBindingConfig {
  name: string;
  min?: number;
  max?: number;
}

/** Échelle linéaire 0..127 → min..max. */
export function linearScale(min: number, max: number): (raw: number) => number {
  return (raw) => min + (max - min) * (raw / 127);
}

/**
 * Construit une table depuis la configuration YAML (clés = numéros de CC).
 * Les clés non numériques ou hors 0..127 sont ignorées avec un avertissement.
 */
export function mappingFromConfig(controls: Record<string, ControlBindingConfig>): ControlMapping {
  const mapping = new Map<number, ControlBinding>();
  for (const [rawKey, cfg] of Object.entries(controls)) {
    const cc = Number(rawKey);
    if (!Number.isInteger(cc) || cc < 0 || cc > 127 || !cfg?.name) {
      logger.warn(`Contrôle ignoré dans la configuration: '${rawKey}'`);
      continue;
    }
    mapping.set(cc, { name: cfg.name, scale: linearScale(cfg.min ?? 0, cfg.max ?? 1) });
  }
  return mapping;
}

export interface InstrumentControllerOptions {
  bus: MidiEventBus;
  id: string;
  state: ControlState;
  handler: ControlHandler;
  mapping: ControlMapping;
  /** Restreint l'écoute à un périphérique; défaut: toutes sources. */
  device?: MidiDevice;
  /** Notifié pour chaque CC absent de la table (le message est ignoré). */
  onUnmapped?: (msg: ControlChangeMessage) => void;
}

/**
 * Suit l'état des paramètres d'un instrument piloté par des Control Change.
 *
 * Abonnement ordonné: les écritures dans `state` suivent exactement l'ordre
 * d'arrivée des messages d'une même source. Un CC non mappé ne modifie rien.
 */
export class InstrumentController {
  readonly id: string;
  readonly subscriptionId: string;
  private readonly bus: MidiEventBus;
  private readonly state: ControlState;
  private readonly handler: ControlHandler;
  private readonly mapping: ControlMapping;
  private readonly onUnmapped?: (msg: ControlChangeMessage) => void;
  private active = true;

  constructor(opts: InstrumentControllerOptions) {
    this.id = opts.id;
    this.bus = opts.bus;
    this.state = opts.state;
    this.handler = opts.handler;
    this.mapping = opts.mapping;
    this.onUnmapped = opts.onUnmapped;
    this.subscriptionId = subscriptionId("inst-controller", opts.id, "control-change");
    const key = opts.device ? deviceKey(opts.device, "controlChange") : commandKey("controlChange");
    this.bus.subscribeOrdered(key, (msg) => { this.handle(msg); }, this.subscriptionId);
  }

  get isActive(): boolean {
    return this.active;
  }

  /**
   * Applique un message: lookup → scale → écriture de l'état → handler.
   * @returns true si le message a été appliqué
   */
  handle(msg: MidiMessage): boolean {
    if (msg.command !== "controlChange") return false;
    const binding = this.mapping.get(msg.controller);
    if (!binding) {
      logger.debug(`CC ${msg.controller} non mappé pour '${this.id}' (${msg.device.name}), ignoré.`);
      this.onUnmapped?.(msg);
      return false;
    }
    const value = binding.scale(msg.value);
    this.state.set(binding.name, value);
    this.handler(binding.name, value);
    return true;
  }

  stop(): void {
    this.bus.unsubscribe(this.subscriptionId);
    this.active = false;
  }
}
