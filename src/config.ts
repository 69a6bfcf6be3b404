import { promises as fs } from "fs";
import path from "path";
import YAML from "yaml";
import chokidar from "chokidar";
import { isLogLevel } from "./logger";
import type { LogLevel } from "./logger";
import type { ControlBindingConfig } from "./midi/controller";
import { DEFAULT_EXCLUDED_DEVICES, DEFAULT_POLL_INTERVAL_MS } from "./midi/registry";

/**
 * Découverte des périphériques MIDI d'entrée.
 */
export interface MidiConfig {
  /** Re-scan périodique des périphériques (défaut: false → un seul scan au démarrage) */
  poll_enabled: boolean;
  /** Période de re-scan (ms). Défaut: 2000 */
  poll_interval_ms: number;
  /** Noms de périphériques (ou vendeurs) jamais attachés, ajoutés à la liste par défaut */
  excluded_devices: string[];
}

/** Capture interactive du prochain contrôle ("learn"). */
export interface CaptureConfig {
  /** Délai max d'attente (ms); 0 = illimité. Défaut: 30000 */
  timeout_ms: number;
}

/**
 * Instrument piloté depuis un contrôleur: voix polyphoniques et paramètres CC.
 * Exemple YAML:
 *   instruments:
 *     ding:
 *       device: "KeyStep"
 *       controls:
 *         22: { name: attack, min: 0, max: 0.3 }
 */
export interface InstrumentConfig {
  /** Fragment de nom de périphérique; absent = toutes sources */
  device?: string;
  /** Jouer des voix sur note-on/note-off (défaut: true) */
  play?: boolean;
  /** Table CC → paramètre */
  controls?: Record<string, ControlBindingConfig>;
}

/**
 * Configuration racine de l'application.
 */
export interface AppConfig {
  log_level?: LogLevel;
  midi: MidiConfig;
  capture: CaptureConfig;
  instruments: Record<string, InstrumentConfig>;
}

const DEFAULT_PATHS = ["config.yaml", path.join("config", "config.yaml")];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function positiveNumber(value: unknown, fallback: number): number {
  return typeof value === "number" && Number.isFinite(value) && value >= 0 ? value : fallback;
}

/** Liste fixe étendue par la configuration (sans doublons, défauts en tête). */
function extendList(value: unknown, base: readonly string[]): string[] {
  const extra = Array.isArray(value) ? value.filter((v): v is string => typeof v === "string") : [];
  return Array.from(new Set([...base, ...extra]));
}

function parseControls(value: unknown): Record<string, ControlBindingConfig> | undefined {
  if (!isRecord(value)) return undefined;
  const out: Record<string, ControlBindingConfig> = {};
  for (const [k, v] of Object.entries(value)) {
    if (!isRecord(v) || typeof v.name !== "string") continue;
    out[k] = {
      name: v.name,
      min: typeof v.min === "number" ? v.min : undefined,
      max: typeof v.max === "number" ? v.max : undefined,
    };
  }
  return out;
}

function parseInstruments(value: unknown): Record<string, InstrumentConfig> {
  if (!isRecord(value)) return {};
  const out: Record<string, InstrumentConfig> = {};
  for (const [name, v] of Object.entries(value)) {
    if (!isRecord(v)) continue;
    out[name] = {
      device: typeof v.device === "string" ? v.device : undefined,
      play: typeof v.play === "boolean" ? v.play : true,
      controls: parseControls(v.controls),
    };
  }
  return out;
}

/**
 * Applique les valeurs par défaut et écarte les champs invalides d'un document YAML brut.
 */
export function resolveConfig(raw: unknown): AppConfig {
  const doc = isRecord(raw) ? raw : {};
  const midi = isRecord(doc.midi) ? doc.midi : {};
  const capture = isRecord(doc.capture) ? doc.capture : {};
  return {
    log_level: isLogLevel(doc.log_level) ? doc.log_level : undefined,
    midi: {
      poll_enabled: midi.poll_enabled === true,
      poll_interval_ms: positiveNumber(midi.poll_interval_ms, DEFAULT_POLL_INTERVAL_MS) || DEFAULT_POLL_INTERVAL_MS,
      excluded_devices: extendList(midi.excluded_devices, DEFAULT_EXCLUDED_DEVICES),
    },
    capture: {
      timeout_ms: positiveNumber(capture.timeout_ms, 30_000),
    },
    instruments: parseInstruments(doc.instruments),
  };
}

/**
 * Recherche un fichier de configuration existant parmi les chemins par défaut ou un chemin fourni.
 * @param customPath Chemin explicite à tester en priorité
 * @returns Le chemin trouvé ou null
 */
export async function findConfigPath(customPath?: string): Promise<string | null> {
  const candidates = customPath ? [customPath, ...DEFAULT_PATHS] : DEFAULT_PATHS;
  for (const p of candidates) {
    try {
      await fs.access(p);
      return p;
    } catch {
      // candidat suivant
    }
  }
  return null;
}

/**
 * Charge et parse le fichier YAML de configuration.
 * @param filePath Chemin explicite; sinon, recherche via {@link findConfigPath}
 * @returns Configuration par défaut si aucun fichier n'est trouvé
 */
export async function loadConfig(filePath?: string): Promise<AppConfig> {
  const p = await findConfigPath(filePath);
  if (!p) return resolveConfig({});
  const raw = await fs.readFile(p, "utf8");
  return resolveConfig(YAML.parse(raw));
}

/**
 * Observe un fichier de configuration YAML et notifie en cas de modification.
 * @param filePath Chemin du fichier à surveiller
 * @param onChange Callback appelée avec la nouvelle configuration
 * @param onError Callback d'erreur facultative
 * @returns Fonction pour arrêter l'observation
 */
export function watchConfig(
  filePath: string,
  onChange: (cfg: AppConfig) => void,
  onError?: (err: unknown) => void
): () => void {
  const watcher = chokidar.watch(filePath, { ignoreInitial: true });
  const handler = async () => {
    try {
      const raw = await fs.readFile(filePath, "utf8");
      onChange(resolveConfig(YAML.parse(raw)));
    } catch (err) {
      onError?.(err);
    }
  };
  watcher.on("change", handler);
  return () => {
    watcher.close().catch((err: unknown) => onError?.(err));
  };
}
