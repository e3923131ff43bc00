/** Trigger event - dvojice atribut/hodnota přijatá od hosta */
export interface TriggerEvent {
  attribute: string;
  value: string;
}

/** Způsob doručení trigger událostí */
export type ListenerKind = 'socket' | 'file';
