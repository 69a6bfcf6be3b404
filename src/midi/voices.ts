import { logger } from "../logger";
import { subscriptionId } from "../events/bus";
import { commandKey, deviceKey } from "./eventKeys";
import type { MidiEventBus } from "./registry";
import type { EventKey, MidiCommand, MidiDevice, MidiMessage } from "./types";

export type PlayerStatus = "playing" | "stopped";

/**
 * Collaborateur de génération sonore piloté par le hub.
 * `H` est le handle opaque d'une voix.
 */
export interface SoundEngine<H> {
  instantiate(params: Record<string, number>): H;
  setParameter(handle: H, name: string, value: number): void;
  /** Notification facultative des voix terminées d'elles-mêmes. */
  onVoiceEnded?(listener: (handle: H) => void): () => void;
}

export interface PolyVoiceManagerOptions<H> {
  bus: MidiEventBus;
  /** Identifiant d'instance, repris dans les ids d'abonnement. */
  id: string;
  play: (note: number, velocity: number) => H;
  release: (handle: H) => void;
  /** Restreint l'écoute à un périphérique; défaut: toutes sources. */
  device?: MidiDevice;
}

function sourceKey(command: MidiCommand, device?: MidiDevice): EventKey {
  return device ? deviceKey(device, command) : commandKey(command);
}

/**
 * Joue un instrument polyphonique depuis un clavier MIDI: une voix par note tenue.
 *
 * - note-on: `play()` et mémorisation du handle (la dernière note-on gagne;
 *   l'ancien handle est abandonné sans release)
 * - note-off: `release()` de la voix active puis retrait; ignoré si aucune voix
 */
export class PolyVoiceManager<H> {
  readonly id: string;
  readonly noteOnId: string;
  readonly noteOffId: string;
  // Handle encapsulé: H peut lui-même être undefined
  private readonly voices = new Map<number, { handle: H }>();
  private readonly bus: MidiEventBus;
  private readonly play: (note: number, velocity: number) => H;
  private readonly release: (handle: H) => void;
  private currentStatus: PlayerStatus = "playing";

  constructor(opts: PolyVoiceManagerOptions<H>) {
    this.id = opts.id;
    this.bus = opts.bus;
    this.play = opts.play;
    this.release = opts.release;
    this.noteOnId = subscriptionId("poly-player", opts.id, "note-on");
    this.noteOffId = subscriptionId("poly-player", opts.id, "note-off");
    this.bus.subscribeOrdered(sourceKey("noteOn", opts.device), (msg) => this.onNoteOn(msg), this.noteOnId);
    this.bus.subscribeOrdered(sourceKey("noteOff", opts.device), (msg) => this.onNoteOff(msg), this.noteOffId);
  }

  get status(): PlayerStatus {
    return this.currentStatus;
  }

  /** Notes actives, triées. */
  activeNotes(): number[] {
    return Array.from(this.voices.keys()).sort((a, b) => a - b);
  }

  handleFor(note: number): H | undefined {
    return this.voices.get(note)?.handle;
  }

  /**
   * Retire une voix terminée d'elle-même avant sa note-off (sans release).
   * @returns true si la voix était encore active
   */
  voiceEnded(handle: H): boolean {
    for (const [note, voice] of this.voices) {
      if (voice.handle === handle) {
        this.voices.delete(note);
        logger.trace(`Voix terminée (note ${note}) [${this.id}]`);
        return true;
      }
    }
    return false;
  }

  /**
   * Désabonne les deux handlers. Les voix encore actives sont abandonnées.
   */
  stop(): this {
    this.bus.unsubscribe(this.noteOnId);
    this.bus.unsubscribe(this.noteOffId);
    this.currentStatus = "stopped";
    return this;
  }

  private onNoteOn(msg: MidiMessage): void {
    if (msg.command !== "noteOn") return;
    const handle = this.play(msg.note, msg.velocity);
    this.voices.set(msg.note, { handle });
  }

  private onNoteOff(msg: MidiMessage): void {
    if (msg.command !== "noteOff") return;
    const voice = this.voices.get(msg.note);
    if (!voice) return;
    this.release(voice.handle);
    this.voices.delete(msg.note);
  }
}

/**
 * Construit un `PolyVoiceManager` sur un moteur sonore: chaque note instancie une voix
 * `{ note, velocity, gate: 1 }` et la note-off met `gate` à 0.
 */
export function createPolyPlayer<H>(
  bus: MidiEventBus,
  engine: SoundEngine<H>,
  opts: { id: string; device?: MidiDevice }
): { player: PolyVoiceManager<H>; detach: () => void } {
  const player = new PolyVoiceManager<H>({
    bus,
    id: opts.id,
    device: opts.device,
    play: (note, velocity) => engine.instantiate({ note, velocity, gate: 1 }),
    release: (handle) => engine.setParameter(handle, "gate", 0),
  });
  const unlisten = engine.onVoiceEnded?.((handle) => {
    player.voiceEnded(handle);
  });
  return {
    player,
    detach: () => {
      player.stop();
      unlisten?.();
    },
  };
}
