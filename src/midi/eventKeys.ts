import type { EventKey, EventKeyAtom, MidiCommand, MidiDevice } from "./types";

/** Étiquette des clés de commande (toutes sources confondues). */
export const MIDI_DOMAIN = "midi";
/** Étiquette des clés propres à un périphérique. */
export const MIDI_DEVICE_DOMAIN = "midi-device";

/** Clé de commande: `["midi", command]`. */
export function commandKey(command: MidiCommand): EventKey {
  return [MIDI_DOMAIN, command];
}

/**
 * Clé de périphérique: évènements d'une commande, pour un seul périphérique physique.
 */
export function deviceKey(device: MidiDevice, command: MidiCommand): EventKey {
  return [MIDI_DEVICE_DOMAIN, device.vendor, device.name, device.description, command];
}

/**
 * Clé de contrôle: la clé de périphérique prolongée par l'identifiant du contrôle
 * (note ou numéro de CC).
 */
export function controlKey(device: MidiDevice, command: MidiCommand, controlId: number): EventKey {
  return [...deviceKey(device, command), controlId];
}

/** Forme texte injective d'une clé, utilisée pour l'indexation. */
export function eventKeyId(key: EventKey): string {
  return JSON.stringify(key);
}

/** Vrai si `prefix` est un préfixe (éventuellement égal) de `key`. */
export function isPrefixOf(prefix: EventKey, key: EventKey): boolean {
  if (prefix.length > key.length) return false;
  return prefix.every((atom: EventKeyAtom, i) => atom === key[i]);
}

/** Affichage compact (ex: `midi-device/Acme/Pads/…/controlChange/22`). */
export function formatEventKey(key: EventKey): string {
  return key.map(String).join("/");
}
