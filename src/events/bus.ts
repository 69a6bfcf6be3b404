import { logger } from "../logger";
import { eventKeyId, formatEventKey } from "../midi/eventKeys";
import type { EventKey } from "../midi/types";

/** Handler d'abonné. Une promesse rejetée est journalisée, jamais propagée. */
export type EventHandler<P> = (payload: P) => void | Promise<void>;

/**
 * Modes de livraison:
 * - `ordered`: exécuté de façon synchrone dans `publish()`, sur le flux du producteur
 * - `concurrent`: planifié sur la boucle d'évènements, sans garantie d'ordre
 * - `once`: comme `ordered`, mais retiré avant son unique invocation
 */
export type DeliveryMode = "ordered" | "concurrent" | "once";

interface Subscription<P> {
  readonly id: string;
  readonly key: EventKey;
  readonly keyId: string;
  readonly mode: DeliveryMode;
  readonly handler: EventHandler<P>;
}

/** Vue publique d'un abonnement (diagnostic/CLI). */
export interface SubscriptionInfo {
  id: string;
  key: EventKey;
  mode: DeliveryMode;
}

/**
 * Construit un identifiant d'abonnement explicite "composant:instance:rôle".
 */
export function subscriptionId(component: string, instance: string, role: string): string {
  return `${component}:${instance}:${role}`;
}

/**
 * Bus d'évènements en mémoire adressé par clés hiérarchiques.
 *
 * Invariants:
 * - Un évènement n'atteint que les abonnés de sa clé exacte; les granularités
 *   (commande, périphérique, contrôle) sont publiées séparément par le producteur
 * - Un identifiant désigne au plus un abonnement; se réabonner avec le même id remplace l'ancien
 * - `unsubscribe()` est effectif pour toute publication postérieure à son retour
 */
export class EventBus<P> {
  private readonly byId = new Map<string, Subscription<P>>();
  private readonly byKey = new Map<string, Map<string, Subscription<P>>>();
  private readonly inflight = new Set<Promise<void>>();

  subscribeOrdered(key: EventKey, handler: EventHandler<P>, id: string): string {
    return this.add(key, handler, id, "ordered");
  }

  subscribeConcurrent(key: EventKey, handler: EventHandler<P>, id: string): string {
    return this.add(key, handler, id, "concurrent");
  }

  subscribeOnce(key: EventKey, handler: EventHandler<P>, id: string): string {
    return this.add(key, handler, id, "once");
  }

  /**
   * Retire un abonnement. Sans effet (retourne false) si l'id est inconnu ou déjà retiré.
   * Les invocations concurrentes déjà planifiées s'exécutent quand même.
   */
  unsubscribe(id: string): boolean {
    const sub = this.byId.get(id);
    if (!sub) return false;
    this.byId.delete(id);
    const bucket = this.byKey.get(sub.keyId);
    if (bucket) {
      bucket.delete(id);
      if (bucket.size === 0) this.byKey.delete(sub.keyId);
    }
    return true;
  }

  /**
   * Publie `payload` sur `key`.
   * @returns Nombre d'abonnés atteints (ou planifiés)
   */
  publish(key: EventKey, payload: P): number {
    const bucket = this.byKey.get(eventKeyId(key));
    if (!bucket || bucket.size === 0) return 0;
    const targets = Array.from(bucket.values());
    for (const s of targets) {
      if (s.mode === "once") this.unsubscribe(s.id);
    }
    let reached = 0;
    for (const s of targets) {
      switch (s.mode) {
        case "once":
          this.invoke(s, payload);
          reached += 1;
          break;
        case "ordered":
          // Peut avoir été retiré par un handler précédent de la même publication
          if (this.byId.get(s.id) !== s) break;
          this.invoke(s, payload);
          reached += 1;
          break;
        case "concurrent":
          if (this.byId.get(s.id) !== s) break;
          this.schedule(s, payload);
          reached += 1;
          break;
      }
    }
    return reached;
  }

  /** Nombre d'abonnés, pour une clé ou au total. */
  subscriberCount(key?: EventKey): number {
    if (!key) return this.byId.size;
    return this.byKey.get(eventKeyId(key))?.size ?? 0;
  }

  has(id: string): boolean {
    return this.byId.has(id);
  }

  listSubscriptions(): SubscriptionInfo[] {
    return Array.from(this.byId.values(), (s) => ({ id: s.id, key: s.key, mode: s.mode }));
  }

  /** Attend la fin des invocations concurrentes en cours (y compris celles planifiées entre-temps). */
  async idle(): Promise<void> {
    while (this.inflight.size > 0) {
      await Promise.all(Array.from(this.inflight));
    }
  }

  /** Retire tous les abonnements. */
  clear(): void {
    this.byId.clear();
    this.byKey.clear();
  }

  private add(key: EventKey, handler: EventHandler<P>, id: string, mode: DeliveryMode): string {
    this.unsubscribe(id);
    const keyId = eventKeyId(key);
    const sub: Subscription<P> = { id, key: [...key], keyId, mode, handler };
    this.byId.set(id, sub);
    let bucket = this.byKey.get(keyId);
    if (!bucket) {
      bucket = new Map();
      this.byKey.set(keyId, bucket);
    }
    bucket.set(id, sub);
    logger.trace(`EventBus: +${mode} '${id}' sur ${formatEventKey(key)}`);
    return id;
  }

  private invoke(s: Subscription<P>, payload: P): void {
    try {
      const result = s.handler(payload);
      if (result instanceof Promise) {
        result.catch((err: unknown) => this.reportError(s, err));
      }
    } catch (err) {
      this.reportError(s, err);
    }
  }

  private schedule(s: Subscription<P>, payload: P): void {
    const task: Promise<void> = new Promise<void>((resolve) => setImmediate(resolve))
      .then(() => s.handler(payload))
      .catch((err: unknown) => this.reportError(s, err))
      .finally(() => {
        this.inflight.delete(task);
      });
    this.inflight.add(task);
  }

  private reportError(s: Subscription<P>, err: unknown): void {
    logger.warn(`EventBus: handler '${s.id}' en erreur (${formatEventKey(s.key)}):`, err);
  }
}
