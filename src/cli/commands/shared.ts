import type { ListenerKind } from '../../types/event.js';
import type { CliConfig } from '../types.js';
import type { BuildOptions } from '../../core/orchestrator.js';
import type { WatchMode } from '../../listener/watch-strategy.js';

/** Přepínače příkazové řádky, které přebíjí `.protocheck.json` */
export interface BuildOverrides {
  listenerDir?: string | undefined;
  useFiles?: boolean | undefined;
  seed?: number | undefined;
  suffix?: string | undefined;
  detailed?: boolean | undefined;
  allowCode?: boolean | undefined;
  lenient?: boolean | undefined;
  watch?: WatchMode | undefined;
}

/** Sestaví options pro `buildTests` z konfigurace a CLI přepínačů */
export function toBuildOptions(config: CliConfig, overrides: BuildOverrides): BuildOptions {
  const listenerKind: ListenerKind = overrides.useFiles ? 'file' : config.listener.type;

  return {
    listenerDir: overrides.listenerDir ?? config.listener.dir,
    listenerKind,
    watch: overrides.watch ?? config.listener.watch,
    pollIntervalMs: config.listener.pollIntervalMs,
    suffix: overrides.suffix,
    seed: overrides.seed,
    hostTemplate: config.hostTemplate,
    rules: {
      allowCode: overrides.allowCode || config.rules.allowCode,
      codeTimeoutMs: config.rules.codeTimeoutMs,
      lenient: overrides.lenient || config.rules.lenient
    },
    detailed: overrides.detailed ?? config.output.detailed,
    actionGraceMs: config.actionGraceMs
  };
}
