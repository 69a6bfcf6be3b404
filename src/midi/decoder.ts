import type { MidiCommand, MidiDevice, MidiMessage } from "./types";

const COMMAND_BY_NIBBLE: Record<number, MidiCommand> = {
  0x8: "noteOff",
  0x9: "noteOn",
  0xa: "polyAftertouch",
  0xb: "controlChange",
  0xc: "programChange",
  0xd: "channelAftertouch",
  0xe: "pitchBend",
};

/**
 * Décode une trame brute en message de canal.
 * Retourne null pour les messages système (SysEx, horloge, …) et les trames vides.
 */
export function decodeMidi(raw: number[], device: MidiDevice, timestamp?: number): MidiMessage | null {
  if (raw.length === 0) return null;
  const status = raw[0];
  if (status >= 0xf0 || status < 0x80) return null;

  const command = COMMAND_BY_NIBBLE[(status & 0xf0) >> 4];
  const channel = (status & 0x0f) + 1; // 1..16
  const d1 = (raw[1] ?? 0) & 0x7f;
  const d2 = (raw[2] ?? 0) & 0x7f;
  const base = { channel, data1: d1, data2: d2, raw: raw.slice(), device, timestamp };

  switch (command) {
    case "noteOn":
      // Note On vélocité 0 → Note Off
      if (d2 === 0) return { ...base, command: "noteOff", note: d1, velocity: 0 };
      return { ...base, command, note: d1, velocity: d2 };
    case "noteOff":
      return { ...base, command, note: d1, velocity: d2 };
    case "controlChange":
      return { ...base, command, controller: d1, value: d2 };
    default:
      return { ...base, command };
  }
}

/** Description humaine d'un message (logs, CLI). */
export function formatMessage(msg: MidiMessage): string {
  switch (msg.command) {
    case "noteOn":
      return `NoteOn ch=${msg.channel} note=${msg.note} vel=${msg.velocity}`;
    case "noteOff":
      return `NoteOff ch=${msg.channel} note=${msg.note} vel=${msg.velocity}`;
    case "controlChange":
      return `CC ch=${msg.channel} cc=${msg.controller} val=${msg.value}`;
    case "pitchBend": {
      const value14 = (msg.data2 << 7) | msg.data1;
      return `PitchBend ch=${msg.channel} val14=${value14}`;
    }
    case "programChange":
      return `Program ch=${msg.channel} pgm=${msg.data1}`;
    case "channelAftertouch":
      return `ChAftertouch ch=${msg.channel} press=${msg.data1}`;
    case "polyAftertouch":
      return `PolyAftertouch ch=${msg.channel} note=${msg.data1} press=${msg.data2}`;
  }
}

/**
 * Retourne une représentation hexadécimale lisible (ex: "90 00 7f").
 */
export function hex(bytes: number[]): string {
  return bytes.map((b) => b.toString(16).padStart(2, "0")).join(" ");
}
