import { logger, parseLogLevel, setLogLevel } from "./logger";
import { loadConfig, findConfigPath, watchConfig } from "./config";
import type { AppConfig } from "./config";
import { attachCli, shouldAttachCli } from "./cli";
import { applyMidiConfig, attachInstruments, createHub, shutdownHub } from "./app/bootstrap";
import { ConsoleSoundEngine } from "./audio/consoleEngine";
import { NodeMidiDeviceSource } from "./midi/devices";

function applyLogLevel(cfg: AppConfig): void {
  // LOG_LEVEL (environnement) prime sur le fichier
  setLogLevel(parseLogLevel(process.env.LOG_LEVEL, cfg.log_level ?? "info"));
}

/**
 * Point d'entrée de l'application.
 * - Charge la configuration et crée le hub (bus, registre, cache)
 * - Scanne les périphériques (ou démarre la scrutation) et branche les instruments
 * - Active le hot‑reload de la configuration et la CLI interactive
 *
 * @returns Fonction de nettoyage (arrêt propre des composants)
 */
export async function startApp(): Promise<() => Promise<void>> {
  logger.info("Démarrage MIDI Hub…");
  const configPath = await findConfigPath();
  if (!configPath) logger.warn("Aucun config.yaml trouvé, configuration par défaut.");

  let cfg: AppConfig = await loadConfig(configPath ?? undefined);
  applyLogLevel(cfg);

  const hub = createHub(cfg, new NodeMidiDeviceSource());
  applyMidiConfig(hub, cfg);
  logger.info(`${hub.registry.size} périphérique(s) MIDI attaché(s).`);

  let instruments = attachInstruments(hub, cfg.instruments, (name) => new ConsoleSoundEngine(name));

  // Hot reload config
  const stopWatch = configPath
    ? watchConfig(
        configPath,
        (next) => {
          cfg = next;
          applyLogLevel(next);
          applyMidiConfig(hub, next);
          instruments.detach();
          instruments = attachInstruments(hub, next.instruments, (name) => new ConsoleSoundEngine(name));
          logger.info("Configuration rechargée.");
        },
        (err) => logger.warn("Erreur hot reload config:", err)
      )
    : () => {};

  // CLI & arrêt propre
  let detachCli: () => void = () => {};
  let isCleaningUp = false;
  const cleanup = async (): Promise<void> => {
    if (isCleaningUp) return;
    isCleaningUp = true;
    logger.info("Arrêt MIDI Hub");
    stopWatch();
    instruments.detach();
    await hub.bus.idle();
    shutdownHub(hub);
    process.exit(0);
  };

  // N'attacher la CLI que dans un terminal interactif
  if (shouldAttachCli()) {
    logger.info("CLI activée (session interactive détectée).");
    detachCli = attachCli({ hub, getConfig: () => cfg, onExit: cleanup });
  } else {
    logger.info("CLI désactivée (MIDI_HUB_DISABLE_CLI ou stdin non-interactif).");
  }

  const shutdown = () => {
    detachCli();
    cleanup().catch((err: unknown) => logger.error("Erreur à l'arrêt:", err));
  };
  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);
  process.on("uncaughtException", (err: unknown) => {
    logger.error("Uncaught exception:", err);
    shutdown();
  });
  process.on("unhandledRejection", (reason: unknown) => {
    logger.error("Unhandled rejection:", reason);
    shutdown();
  });

  return cleanup;
}
