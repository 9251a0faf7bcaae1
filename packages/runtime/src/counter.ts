/**
 * Invocation counter for deprecated routines
 *
 * Instrumented routines call `onDeprecatedMethodCalled` with their
 * descriptive signature, e.g. `com.example.Widget.render()`, on every entry.
 */

export class DeprecatedMethodInvocationCounter {
  private static readonly counts = new Map<string, number>();

  private constructor() {}

  /** Record one invocation of `methodDefinition` */
  static onDeprecatedMethodCalled(methodDefinition: string): void {
    const counts = DeprecatedMethodInvocationCounter.counts;
    counts.set(methodDefinition, (counts.get(methodDefinition) ?? 0) + 1);
  }

  static hasThisMethodInvoked(methodDefinition: string): boolean {
    return DeprecatedMethodInvocationCounter.counts.has(methodDefinition);
  }

  static getInvocationCount(methodDefinition: string): number {
    return DeprecatedMethodInvocationCounter.counts.get(methodDefinition) ?? 0;
  }

  /** Snapshot of every recorded signature and its count */
  static getInvocationRecord(): ReadonlyMap<string, number> {
    return new Map(DeprecatedMethodInvocationCounter.counts);
  }

  static reset(): void {
    DeprecatedMethodInvocationCounter.counts.clear();
  }
}
