export interface ArchCheck {
  readonly name: string;
  readonly params: readonly string[];
}

export interface Architecture {
  readonly name: string;
  readonly environment: string;
  readonly include: string;
  readonly alignment: number;
  readonly checks: readonly ArchCheck[];
  /** compiler -> ordered flags */
  readonly flags: ReadonlyMap<string, readonly string[]>;
}

export interface Machine {
  readonly name: string;
  readonly archNames: readonly string[];
  readonly archs: readonly Architecture[];
  readonly alignment: number;
}
