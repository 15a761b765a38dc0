import { EventEmitter } from 'node:events';

/**
 * A participant in a collective exchange. `allGather` is a barrier: it
 * resolves once every participant of the group has contributed its value for
 * the same round, with the values ordered by rank.
 */
export interface Collective<T> {
  readonly rank: number;
  readonly worldSize: number;
  allGather(value: T): Promise<T[]>;
}

/** The degenerate group of one: gathering returns the caller's own value. */
export class SingleProcessCollective<T> implements Collective<T> {
  readonly rank = 0;
  readonly worldSize = 1;

  async allGather(value: T): Promise<T[]> {
    return [structuredClone(value)];
  }
}

type Round<T> = {
  values: Array<T | undefined>;
  contributed: Set<number>;
};

class LocalCollectiveGroup<T> extends EventEmitter {
  private readonly rounds = new Map<number, Round<T>>();

  constructor(readonly worldSize: number) {
    super();
    this.setMaxListeners(worldSize + 10);
  }

  contribute(round: number, rank: number, value: T) {
    const state = this.rounds.get(round) ?? {
      values: new Array<T | undefined>(this.worldSize).fill(undefined),
      contributed: new Set<number>()
    };
    if (state.contributed.has(rank)) {
      throw new Error(`Rank ${rank} already contributed to gather round ${round}`);
    }
    state.values[rank] = structuredClone(value);
    state.contributed.add(rank);
    this.rounds.set(round, state);

    if (state.contributed.size === this.worldSize) {
      this.rounds.delete(round);
      const values = state.values.filter((entry): entry is T => entry !== undefined);
      this.emit(`round:${round}`, values);
    }
  }
}

class LocalCollective<T> implements Collective<T> {
  private round = 0;

  constructor(
    private readonly group: LocalCollectiveGroup<T>,
    readonly rank: number
  ) {}

  get worldSize(): number {
    return this.group.worldSize;
  }

  allGather(value: T): Promise<T[]> {
    const round = this.round;
    this.round += 1;
    return new Promise<T[]>((resolve, reject) => {
      const event = `round:${round}`;
      const handler = (values: T[]) => {
        resolve(values.map(entry => structuredClone(entry)));
      };
      this.group.once(event, handler);
      try {
        this.group.contribute(round, this.rank, value);
      } catch (error) {
        this.group.off(event, handler);
        reject(error);
      }
    });
  }
}

/**
 * An in-process group of `worldSize` participants, one {@link Collective}
 * per rank. Values are structurally cloned on the way in and out, so
 * participants never share mutable state.
 */
export function createLocalCollectiveGroup<T>(worldSize: number): Collective<T>[] {
  if (!Number.isInteger(worldSize) || worldSize < 1) {
    throw new Error(`worldSize must be a positive integer, received ${worldSize}`);
  }
  const group = new LocalCollectiveGroup<T>(worldSize);
  return Array.from({ length: worldSize }, (_, rank) => new LocalCollective(group, rank));
}
