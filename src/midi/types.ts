/**
 * Périphérique MIDI d'entrée découvert. Immuable une fois découvert;
 * l'identité (déduplication) repose uniquement sur `handle`.
 */
export interface MidiDevice {
  readonly vendor: string;
  readonly name: string;
  readonly description: string;
  /** Identifiant opaque côté I/O (nom de port complet pour @julusian/midi). */
  readonly handle: string;
}

/** Commandes MIDI de canal routées par le hub. */
export type MidiCommand =
  | "noteOff"
  | "noteOn"
  | "polyAftertouch"
  | "controlChange"
  | "programChange"
  | "channelAftertouch"
  | "pitchBend";

interface BaseMessage {
  channel: number; // 1..16
  /** Identifiant primaire: note ou numéro de contrôleur. */
  data1: number;
  data2: number;
  raw: number[];
  device: MidiDevice;
  /** Horodatage de réception (ms epoch) */
  timestamp?: number;
}

export interface NoteMessage extends BaseMessage {
  command: "noteOn" | "noteOff";
  note: number; // 0..127
  velocity: number; // 0..127
}

export interface ControlChangeMessage extends BaseMessage {
  command: "controlChange";
  controller: number; // 0..127
  value: number; // 0..127
}

export interface OtherChannelMessage extends BaseMessage {
  command: "polyAftertouch" | "programChange" | "channelAftertouch" | "pitchBend";
}

export type MidiMessage = NoteMessage | ControlChangeMessage | OtherChannelMessage;

/** Atome d'une clé d'évènement. */
export type EventKeyAtom = string | number;

/** Adresse hiérarchique d'un évènement (commande, périphérique, contrôle). */
export type EventKey = readonly EventKeyAtom[];
