/**
 * Validation errors raised by the beam engine.
 *
 * Both kinds end the request: no diagrams are produced for a load case that
 * fails either check.
 */

export type LoadItemKind = "point_load" | "udl" | "moment";

export interface LoadItemRef {
  kind: LoadItemKind;
  /** 1-based, as shown on the form */
  index: number;
}

/** A load, moment or UDL placed outside `[0, L]`, or a UDL with `start > end`. */
export class LoadRangeError extends RangeError {
  readonly item: LoadItemRef;

  constructor(message: string, item: LoadItemRef) {
    super(message);
    this.name = "LoadRangeError";
    this.item = item;
  }
}

/** Beam properties or sampling parameters that make the calculation meaningless. */
export class DomainError extends Error {
  readonly field: string;

  constructor(message: string, field: string) {
    super(message);
    this.name = "DomainError";
    this.field = field;
  }
}

export function describeItem(item: LoadItemRef): string {
  switch (item.kind) {
    case "point_load":
      return `Point load ${item.index}`;
    case "moment":
      return `Moment ${item.index}`;
    case "udl":
      return "UDL";
  }
}
