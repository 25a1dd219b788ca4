/**
 * Recommendation rules
 *
 * A fixed table of hand-written heuristics over detector counts. Each rule
 * emits at most one line; rules run in table order. Keys that are missing
 * from the hit map count as zero.
 */

/**
 * Anything that carries a hit count
 */
export interface Counted {
  readonly count: number;
}

/**
 * Count lookup handed to each rule
 */
export type CountOf = (key: string) => number;

/**
 * A single recommendation heuristic
 */
export interface RecommendationRule {
  readonly id: string;
  evaluate(count: CountOf): string | undefined;
}

export const RECOMMENDATION_RULES: readonly RecommendationRule[] = [
  {
    id: "dependency-injection",
    evaluate: (count) => {
      const field = count("di_field");
      if (field > 0 && count("di_constructor") >= field) {
        return "**Frameworks & Dependency Injection:** Constructor injection appears common; some field injection remains.";
      }
      if (field > 0) {
        return "**Frameworks & Dependency Injection:** Field injection detected in multiple places; prefer constructor injection.";
      }
      return undefined;
    },
  },
  {
    id: "apollo",
    evaluate: (count) =>
      count("apollo") > 0
        ? "**Apollo Framework:** Detected Apollo usage; ensure proper request/response handling and middleware."
        : undefined,
  },
  {
    id: "dagger",
    evaluate: (count) =>
      count("dagger") > 0
        ? "**Dagger:** Consider component scoping and avoid circular dependencies."
        : undefined,
  },
  {
    id: "mixed-junit",
    evaluate: (count) =>
      count("junit5") > 0 && count("junit4") > 0
        ? "**Testing:** Both JUnit 4 and 5 detected; align on JUnit 5."
        : undefined,
  },
  {
    id: "testcontainers",
    evaluate: (count) =>
      count("testcontainers") > 0
        ? "**Testing:** Testcontainers in use; ensure CI supports Docker and parallelism constraints."
        : undefined,
  },
  {
    id: "mixed-async",
    evaluate: (count) =>
      count("reactor") > 0 && count("async") > 0
        ? "**Async & Concurrency:** Mixed reactive and CompletableFuture APIs; document when to choose each."
        : undefined,
  },
  {
    id: "missing-timeouts",
    evaluate: (count) =>
      count("timeouts") === 0 && (count("http_client") > 0 || count("reactor") > 0)
        ? "**Async & Concurrency:** HTTP/reactive usage without obvious timeouts; add timeout guidance."
        : undefined,
  },
  {
    id: "blocking-futures",
    evaluate: (count) => {
      const blocking = count("cf_blocking");
      return blocking > 0
        ? `**CompletableFuture Anti-pattern:** Found ${blocking} blocking calls (.get()/.join()); consider non-blocking composition instead.`
        : undefined;
    },
  },
  {
    id: "future-composition",
    evaluate: (count) =>
      count("async") > 0 && count("cf_composition") === 0
        ? "**CompletableFuture:** Using CompletableFuture but no composition methods detected; verify proper async patterns."
        : undefined,
  },
  {
    id: "future-error-handling",
    evaluate: (count) =>
      count("async") > 0 && count("cf_error_handling") === 0
        ? "**CompletableFuture:** Using CompletableFuture but no error handling (.exceptionally/.handle) detected."
        : undefined,
  },
  {
    id: "future-executors",
    evaluate: (count) =>
      count("cf_executors") === 0 && count("async") > 0
        ? "**CompletableFuture:** No custom executors detected; ensure thread pool isolation for blocking operations."
        : undefined,
  },
  {
    id: "completion-stage",
    evaluate: (count) =>
      count("async") > 0 && count("cf_completion_stage") === 0
        ? "**CompletableFuture API Design:** Consider using CompletionStage in method parameters for safer API design."
        : undefined,
  },
  {
    id: "metrics",
    evaluate: (count) =>
      count("micrometer") === 0 && count("apollo_metrics") === 0
        ? "**Observability & Logging:** No metrics framework detected; consider Apollo metrics or Micrometer."
        : undefined,
  },
  {
    id: "quality-gates",
    evaluate: (count) =>
      count("spotless") === 0 && count("checkstyle") === 0 && count("pmd") === 0
        ? "**Build, Config & Quality Gates:** Formatting/static analysis not clearly configured; consider Spotless + Checkstyle/PMD."
        : undefined,
  },
  {
    id: "lombok-and-records",
    evaluate: (count) =>
      count("lombok") > 0 && count("records") > 0
        ? "**Language Features & Libraries:** Both Lombok and records present; clarify when to use each."
        : undefined,
  },
];

/**
 * Run every rule against the hit map
 */
export function deriveRecommendations(
  hits: ReadonlyMap<string, Counted>,
  rules: readonly RecommendationRule[] = RECOMMENDATION_RULES
): string[] {
  const count: CountOf = (key) => hits.get(key)?.count ?? 0;
  const lines: string[] = [];

  for (const rule of rules) {
    const line = rule.evaluate(count);
    if (line !== undefined) {
      lines.push(line);
    }
  }

  return lines;
}
