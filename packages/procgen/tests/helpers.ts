/**
 * Return what `fn` throws; fail the test if it returns normally.
 */
export function thrown(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error("Expected function to throw");
}

/**
 * Random source whose `range` answers follow a script of "min"/"max"
 * picks, then "min" once the script runs out.
 */
export class ScriptedRandom {
  private index = 0;
  readonly calls: [number, number][] = [];

  constructor(private readonly script: readonly ("min" | "max")[] = []) {}

  next(): number {
    return 0;
  }

  range(min: number, max: number): number {
    this.calls.push([min, max]);
    const pick = this.script[this.index++] ?? "min";
    return pick === "min" ? min : max;
  }
}
