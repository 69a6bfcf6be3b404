import { Input } from "@julusian/midi";
import { logger } from "../logger";
import type { MidiDevice } from "./types";

/** Callback de réception d'une trame brute. */
export type RawMessageListener = (raw: number[], timestamp: number) => void;

/** Récepteur ouvert sur un périphérique d'entrée. */
export interface MidiReceiver {
  onMessage(listener: RawMessageListener): void;
  close(): void;
}

/**
 * Collaborateur de découverte et d'I/O des périphériques d'entrée.
 */
export interface MidiDeviceSource {
  listAvailableInputDevices(): MidiDevice[];
  /** @throws si le périphérique ne peut pas être ouvert */
  openReceiver(device: MidiDevice): MidiReceiver;
}

const ALSA_PORT = /^(.+?):(.+?)\s+\d+:\d+$/;

/**
 * Construit un `MidiDevice` depuis un nom de port.
 * Les noms ALSA ("Client:Port 20:0") donnent vendor=client et name=port.
 */
export function describePort(portName: string): MidiDevice {
  const m = ALSA_PORT.exec(portName);
  const vendor = m ? m[1].trim() : "unknown";
  const name = m ? m[2].trim() : portName.trim();
  return { vendor, name, description: portName, handle: portName };
}

class NodeMidiReceiver implements MidiReceiver {
  private readonly listeners: RawMessageListener[] = [];
  private open = true;

  constructor(private readonly input: Input, private readonly device: MidiDevice) {
    input.on("message", (_delta: number, data: number[]) => {
      const now = Date.now();
      for (const l of this.listeners) l(data.slice(), now);
    });
  }

  onMessage(listener: RawMessageListener): void {
    this.listeners.push(listener);
  }

  close(): void {
    if (!this.open) return;
    this.open = false;
    this.listeners.length = 0;
    try {
      this.input.closePort();
    } catch (err) {
      logger.debug(`Fermeture du port '${this.device.handle}' échouée:`, err);
    }
  }
}

/**
 * Source de périphériques basée sur @julusian/midi (RtMidi).
 */
export class NodeMidiDeviceSource implements MidiDeviceSource {
  listAvailableInputDevices(): MidiDevice[] {
    const input = new Input();
    try {
      const count = input.getPortCount();
      const devices: MidiDevice[] = [];
      for (let i = 0; i < count; i += 1) {
        const name = input.getPortName(i);
        if (name) devices.push(describePort(name));
      }
      return devices;
    } finally {
      input.closePort();
    }
  }

  openReceiver(device: MidiDevice): MidiReceiver {
    const input = new Input();
    const count = input.getPortCount();
    let idx: number | null = null;
    for (let i = 0; i < count; i += 1) {
      if (input.getPortName(i) === device.handle) {
        idx = i;
        break;
      }
    }
    if (idx == null) {
      input.closePort();
      throw new Error(`Port MIDI introuvable: '${device.handle}'`);
    }
    // SysEx, horloge et active sensing ne sont pas routés
    input.ignoreTypes(true, true, true);
    const receiver = new NodeMidiReceiver(input, device);
    input.openPort(idx);
    logger.debug(`MIDI IN ouvert: [${idx}] ${device.handle}`);
    return receiver;
  }
}
