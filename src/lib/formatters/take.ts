/**
 * Left-to-right string pipeline: `new Take(x).then(f).then(g, arg).value`.
 */
export class Take {
  constructor(readonly value: string) {}

  then<A extends unknown[]>(fn: (value: string, ...args: A) => string, ...args: A): Take {
    return new Take(fn(this.value, ...args));
  }

  toString(): string {
    return this.value;
  }
}
