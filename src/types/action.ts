import type { Logger } from '../logging/logger.js';
import type { ListenerKind } from './event.js';

/** Vypočtené parametry, které si akce může vyžádat */
export type InjectableParam = 'source' | 'target' | 'testName' | 'logger';

/** Parametry akce tak, jak jsou v konfiguraci */
export type ActionParams = Readonly<Record<string, unknown>>;

/** Hodnoty doplněné podle `inject` definice akce */
export interface ActionInjections {
  /** Plný identifikátor hosta, na kterém akce běží */
  source?: string;
  /** Plný identifikátor cílového hosta (`target` parametr) */
  target?: string;
  testName?: string;
  logger?: Logger;
}

/** Běhové prostředí předané akci při spuštění */
export interface ActionRuntime {
  signal: AbortSignal;
  /** Kam hosté posílají trigger události v právě běžícím stavu */
  trigger: {
    kind: ListenerKind;
    destination: string;
  };
}

export interface ActionDefinition {
  name: string;
  aliases?: readonly string[];
  inject?: readonly InjectableParam[];
  /** Kontrola parametrů při sestavení testu; chyba test přeskočí */
  validate?(params: ActionParams, path: string): void;
  run(params: ActionParams, injected: ActionInjections, runtime: ActionRuntime): Promise<void>;
}

/** Jedna akce jedné konfigurace hosta */
export interface ActionConfig {
  name: string;
  params: ActionParams;
}

export interface HostConfig {
  name: string;
  actions: ActionConfig[];
}

/** Akce s doplněnými parametry připravená ke spuštění */
export interface BoundAction {
  readonly name: string;
  readonly host: string;
  execute(runtime: ActionRuntime): Promise<void>;
}
