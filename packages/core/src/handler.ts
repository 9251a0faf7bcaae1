/**
 * Marker handler contract
 *
 * A handler claims one or more markers and, once per processing round,
 * receives the elements the host found carrying them. Each element is
 * processed independently: a failure on one is recorded in the report and
 * the batch carries on.
 */

import type { ResolvedEnvironment } from "./environment.js";
import { describeError } from "./messager.js";
import type { MarkedElement, MarkerName } from "./types.js";

// ============================================================================
// Outcomes
// ============================================================================

/** Raised (and recorded) when rewriting a single element fails */
export class ElementProcessingFailed extends Error {
  constructor(
    readonly element: MarkedElement,
    cause: unknown
  ) {
    super(
      `Failed to process ${element.enclosingType.qualifiedName}.${element.name}: ${describeError(cause)}`,
      { cause }
    );
    this.name = "ElementProcessingFailed";
  }
}

export type ElementOutcome =
  | { readonly state: "rewritten"; readonly element: MarkedElement }
  | { readonly state: "skipped"; readonly element: MarkedElement; readonly reason: string }
  | {
      readonly state: "failed";
      readonly element: MarkedElement;
      readonly error: ElementProcessingFailed;
    };

/** Per-element results of one `process` call, in input order */
export interface ProcessingReport {
  readonly handler: string;
  readonly outcomes: readonly ElementOutcome[];
}

export function countOutcomes(
  report: ProcessingReport
): Record<ElementOutcome["state"], number> {
  const counts = { rewritten: 0, skipped: 0, failed: 0 };
  for (const outcome of report.outcomes) {
    counts[outcome.state]++;
  }
  return counts;
}

// ============================================================================
// Contract
// ============================================================================

export interface MarkerHandler {
  /** Name used in logs and reports */
  readonly name: string;

  /** The markers this handler claims. Non-empty. */
  markersHandled(): ReadonlySet<MarkerName>;

  /**
   * Rewrite every element. Never throws for a single element's failure;
   * the outcome records it instead.
   */
  process(elements: ReadonlySet<MarkedElement>, env: ResolvedEnvironment): ProcessingReport;
}

/** Either a rewrite happened or the element was deliberately left alone */
export type ElementResult = { readonly state: "rewritten" } | { readonly state: "skipped"; readonly reason: string };

/**
 * Base class for handlers that rewrite elements one at a time.
 *
 * Subclasses implement `processElement`; anything it throws becomes a
 * `failed` outcome for that element only.
 */
export abstract class PerElementHandler implements MarkerHandler {
  abstract readonly name: string;

  abstract markersHandled(): ReadonlySet<MarkerName>;

  protected abstract processElement(element: MarkedElement, env: ResolvedEnvironment): ElementResult;

  process(elements: ReadonlySet<MarkedElement>, env: ResolvedEnvironment): ProcessingReport {
    const outcomes: ElementOutcome[] = [];

    for (const element of elements) {
      try {
        const result = this.processElement(element, env);
        outcomes.push(
          result.state === "rewritten"
            ? { state: "rewritten", element }
            : { state: "skipped", element, reason: result.reason }
        );
      } catch (error) {
        outcomes.push({
          state: "failed",
          element,
          error: error instanceof ElementProcessingFailed ? error : new ElementProcessingFailed(element, error),
        });
      }
    }

    return { handler: this.name, outcomes };
  }
}
