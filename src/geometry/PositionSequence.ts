/**
 * PositionSequence - Ordered, immutable run of same-dimension positions.
 *
 * Built through PositionSequenceBuilder, which accumulates positions and is
 * consumed when the sequence is produced.
 */

import { Position } from "@/math/Position";

// =============================================================================
// SEQUENCE
// =============================================================================

/**
 * An immutable sequence of positions that all share one coordinate dimension.
 */
export class PositionSequence implements Iterable<Position> {
  /** Number of coordinates of every position in the sequence */
  readonly coordinateDimension: number;
  private readonly _positions: readonly Position[];

  /**
   * Prefer PositionSequenceBuilder. The array is taken over, not copied.
   */
  constructor(coordinateDimension: number, positions: readonly Position[]) {
    const index = positions.findIndex((p) => p.length !== coordinateDimension);
    if (index !== -1) {
      throw new Error(
        `Position ${index} has dimension ${positions[index]?.length} in a sequence of dimension ${coordinateDimension}`
      );
    }
    this.coordinateDimension = coordinateDimension;
    this._positions = Object.freeze(positions);
    Object.freeze(this);
  }

  get size(): number {
    return this._positions.length;
  }

  isEmpty(): boolean {
    return this._positions.length === 0;
  }

  /**
   * Get a position by index.
   */
  get(index: number): Position {
    const position = this._positions[index];
    if (!position) {
      throw new Error(`Position index ${index} out of bounds [0, ${this._positions.length - 1}]`);
    }
    return position;
  }

  first(): Position {
    return this.get(0);
  }

  last(): Position {
    return this.get(this._positions.length - 1);
  }

  /**
   * Index of the first position exactly equal to the given one, or -1.
   */
  indexOf(position: Position): number {
    return this._positions.findIndex((p) => Position.equals(p, position));
  }

  /**
   * Whether the sequence starts and ends on the same position (and has more than one).
   */
  isClosed(): boolean {
    return this.size > 1 && Position.equals(this.first(), this.last());
  }

  toArray(): Position[] {
    return [...this._positions];
  }

  [Symbol.iterator](): Iterator<Position> {
    return this._positions[Symbol.iterator]();
  }
}

// =============================================================================
// BUILDER
// =============================================================================

/**
 * Append-only builder for a PositionSequence.
 *
 * Positions passed to add() are stored by reference, so an input position
 * reappears in the output bit-for-bit. Once toPositionSequence() is called the
 * builder is spent.
 */
export class PositionSequenceBuilder {
  readonly coordinateDimension: number;
  private _positions: Position[] = [];
  private _finished = false;

  constructor(coordinateDimension: number) {
    if (!Number.isInteger(coordinateDimension) || coordinateDimension < 2) {
      throw new Error(`Coordinate dimension must be an integer >= 2, got ${coordinateDimension}`);
    }
    this.coordinateDimension = coordinateDimension;
  }

  get size(): number {
    return this._positions.length;
  }

  /**
   * Append a position as-is.
   */
  add(position: Position): this {
    this.assertOpen();
    if (position.length !== this.coordinateDimension) {
      throw new Error(
        `Cannot add a position of dimension ${position.length} to a sequence of dimension ${this.coordinateDimension}`
      );
    }
    this._positions.push(Object.isFrozen(position) ? position : Object.freeze([...position]));
    return this;
  }

  /**
   * Append a copy of a coordinate buffer. The buffer may be reused by the caller.
   */
  addCoordinates(coordinates: ReadonlyArray<number>): this {
    const [x, y, ...auxiliary] = coordinates;
    if (x === undefined || y === undefined) {
      throw new Error(`Coordinate buffer needs at least 2 values, got ${coordinates.length}`);
    }
    return this.add(Position.create(x, y, ...auxiliary));
  }

  /**
   * Finish building. The builder cannot be used afterwards.
   */
  toPositionSequence(): PositionSequence {
    this.assertOpen();
    this._finished = true;
    const positions = this._positions;
    this._positions = [];
    return new PositionSequence(this.coordinateDimension, positions);
  }

  private assertOpen(): void {
    if (this._finished) {
      throw new Error("PositionSequenceBuilder has already produced its sequence");
    }
  }
}
