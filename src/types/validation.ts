/** Stav pravidel jednoho atributu */
export interface AttributeResult {
  attribute: string;
  passed: string[];
  failed: string[];
  /** Label kombinátoru → label potomka, na kterém selhal */
  failureReasons: Record<string, string>;
  /** Počet přijatých událostí pro atribut */
  events: number;
}

export interface ValidationSummary {
  attributes: AttributeResult[];
  /** Tracked rules currently passed */
  matched: number;
  /** Tracked rules (required + forbidden) */
  total: number;
  failures: number;
  events: number;
  /** Události pro atributy bez pravidel */
  unknownEvents: number;
  satisfied: boolean;
}
