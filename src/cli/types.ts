import type { MidiHub } from "../app/bootstrap";
import type { AppConfig } from "../config";

/**
 * Contexte fourni par l'application pour attacher la CLI.
 */
export interface CliContext {
  hub: MidiHub;
  /** Configuration courante (suit le hot reload) */
  getConfig: () => AppConfig;
  onExit?: () => Promise<void> | void;
}
