import { logger } from "../logger";
import { subscriptionId } from "../events/bus";
import { commandKey, deviceKey, eventKeyId, formatEventKey } from "./eventKeys";
import type { MidiEventBus } from "./registry";
import type { EventKey, MidiMessage } from "./types";

/** Dernière paire (contrôleur, valeur brute) observée sur une clé de contrôle. */
export interface CapturedControlValue {
  controller: number;
  value: number;
  timestamp?: number;
}

/** Résultat d'une capture « prochain contrôle manipulé ». */
export interface CapturedControl {
  controller: number;
  value: number;
  /** Clé de périphérique (Control Change) de la source, si demandée. */
  key?: EventKey;
}

export interface CaptureOptions {
  includeKey?: boolean;
  /** Délai max (ms); sans délai, l'attente est illimitée. */
  timeoutMs?: number;
}

export class CaptureTimeoutError extends Error {
  constructor(readonly timeoutMs: number) {
    super(`Aucun Control Change reçu en ${timeoutMs}ms`);
    this.name = "CaptureTimeoutError";
  }
}

export class CaptureCancelledError extends Error {
  constructor() {
    super("Capture annulée");
    this.name = "CaptureCancelledError";
  }
}

type CellListener = (update: CapturedControlValue) => void;
type CellWriter = (update: CapturedControlValue) => void;

/**
 * Cellule à écrivain unique: seule la livraison ordonnée du bus y écrit.
 * La valeur courante est mise à jour dans l'ordre d'arrivée; les observateurs
 * sont notifiés dans ce même ordre, hors du flux producteur.
 *
 * L'écrivain n'est remis qu'une fois, au propriétaire qui construit la cellule.
 */
export class ControlValueCell {
  private current: CapturedControlValue | null = null;
  private readonly listeners = new Set<CellListener>();
  private readonly pending: CapturedControlValue[] = [];
  private draining: Promise<void> | null = null;

  constructor(readonly key: EventKey, connect: (write: CellWriter) => void) {
    connect((update) => this.accept(update));
  }

  get latest(): CapturedControlValue | null {
    return this.current;
  }

  /** Valeur brute courante (0 tant qu'aucun évènement n'est arrivé). */
  get value(): number {
    return this.current?.value ?? 0;
  }

  /** @returns Fonction de désabonnement */
  watch(listener: CellListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /** Résout quand toutes les notifications en attente ont été délivrées. */
  settled(): Promise<void> {
    return this.draining ?? Promise.resolve();
  }

  private accept(update: CapturedControlValue): void {
    this.current = update;
    if (this.listeners.size === 0) return;
    this.pending.push(update);
    if (!this.draining) this.draining = this.drain();
  }

  private async drain(): Promise<void> {
    await Promise.resolve();
    for (let next = this.pending.shift(); next; next = this.pending.shift()) {
      for (const l of this.listeners) {
        try {
          l(next);
        } catch (err) {
          logger.warn(`Observateur de ${formatEventKey(this.key)} en erreur:`, err);
        }
      }
    }
    this.draining = null;
  }
}

interface PendingCapture {
  id: string;
  timer: NodeJS.Timeout | null;
  reject: (err: Error) => void;
}

/**
 * Cache ordonné des dernières valeurs de contrôle, par clé de contrôle,
 * et outils de capture interactive (« learn »).
 */
export class ControlValueCache {
  private readonly cells = new Map<string, { cell: ControlValueCell; subId: string }>();
  private readonly captures = new Map<string, PendingCapture>();
  private captureSeq = 0;

  constructor(private readonly bus: MidiEventBus, readonly id = "default") {}

  /**
   * Cellule de la clé (créée et abonnée au premier appel, mémorisée ensuite).
   */
  latestFor(key: EventKey): ControlValueCell {
    const kid = eventKeyId(key);
    const existing = this.cells.get(kid);
    if (existing) return existing.cell;
    const subId = subscriptionId("control-cache", this.id, `cell:${kid}`);
    const cell = new ControlValueCell([...key], (write) => {
      this.bus.subscribeOrdered(
        key,
        (msg) => write({ controller: msg.data1, value: msg.data2, timestamp: msg.timestamp }),
        subId
      );
    });
    this.cells.set(kid, { cell, subId });
    return cell;
  }

  /** Clés de contrôle suivies. */
  trackedKeys(): EventKey[] {
    return Array.from(this.cells.values(), (c) => c.cell.key);
  }

  /**
   * Attend le prochain Control Change, toutes sources confondues. Résout une seule fois.
   */
  captureNext(opts: CaptureOptions = {}): Promise<CapturedControl> {
    this.captureSeq += 1;
    const id = subscriptionId("control-cache", this.id, `capture-${this.captureSeq}`);
    return new Promise<CapturedControl>((resolve, reject) => {
      const pending: PendingCapture = { id, timer: null, reject };
      this.captures.set(id, pending);
      this.bus.subscribeOnce(
        commandKey("controlChange"),
        (msg: MidiMessage) => {
          this.settleCapture(id);
          const res: CapturedControl = { controller: msg.data1, value: msg.data2 };
          if (opts.includeKey) res.key = deviceKey(msg.device, "controlChange");
          resolve(res);
        },
        id
      );
      if (opts.timeoutMs !== undefined && opts.timeoutMs > 0) {
        const timeoutMs = opts.timeoutMs;
        pending.timer = setTimeout(() => {
          this.bus.unsubscribe(id);
          this.settleCapture(id);
          reject(new CaptureTimeoutError(timeoutMs));
        }, timeoutMs);
      }
    });
  }

  /** Clé de périphérique du prochain contrôleur manipulé. */
  async captureNextControlKey(opts: Omit<CaptureOptions, "includeKey"> = {}): Promise<EventKey> {
    const res = await this.captureNext({ ...opts, includeKey: true });
    return res.key ?? [];
  }

  /** Clé de contrôle précise (périphérique + numéro de CC) du prochain contrôle manipulé. */
  async captureNextControlSpecificKey(opts: Omit<CaptureOptions, "includeKey"> = {}): Promise<EventKey> {
    const res = await this.captureNext({ ...opts, includeKey: true });
    return [...(res.key ?? []), res.controller];
  }

  pendingCaptures(): number {
    return this.captures.size;
  }

  /** Désabonne toutes les cellules et annule les captures en attente. */
  dispose(): void {
    for (const { subId } of this.cells.values()) this.bus.unsubscribe(subId);
    this.cells.clear();
    for (const [id, pending] of Array.from(this.captures)) {
      this.bus.unsubscribe(id);
      this.settleCapture(id);
      pending.reject(new CaptureCancelledError());
    }
  }

  private settleCapture(id: string): void {
    const pending = this.captures.get(id);
    if (!pending) return;
    if (pending.timer) clearTimeout(pending.timer);
    this.captures.delete(id);
  }
}
