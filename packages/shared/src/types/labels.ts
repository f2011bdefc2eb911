/**
 * Labels and target selector types (Kubernetes-like)
 * @module @faultline/shared/types/labels
 */

/**
 * Labels are key-value pairs used for selection
 *
 * @example
 * {
 *   "app": "worker",
 *   "tier": "batch"
 * }
 */
export type Labels = Record<string, string>;

/**
 * Which workloads a fault targets. Always scoped to the request's namespace.
 *
 * @example
 * // Explicit pods
 * { pods: ["worker-0", "worker-1"] }
 *
 * // Every pod carrying these labels
 * { labelSelectors: { app: "worker" } }
 */
export interface TargetSelector {
  /** Explicit pod names */
  pods?: string[];
  /** Pods matching all of these labels */
  labelSelectors?: Labels;
}

/**
 * Two label selectors can only be proven disjoint when they pin the same key to
 * different values. Anything else may select a common pod.
 */
export function labelSelectorsCompatible(a: Labels, b: Labels): boolean {
  for (const [key, value] of Object.entries(a)) {
    if (key in b && b[key] !== value) {
      return false;
    }
  }
  return true;
}

/**
 * Check if two selectors in the same namespace may target a common pod.
 *
 * Pod lists are compared exactly. Where either side selects by labels only,
 * the engine cannot see pod labels, so the selectors overlap unless their
 * label constraints contradict each other.
 */
export function selectorsOverlap(a: TargetSelector, b: TargetSelector): boolean {
  const podsA = a.pods ?? [];
  const podsB = b.pods ?? [];

  if (podsA.length > 0 && podsB.length > 0) {
    const names = new Set(podsA);
    return podsB.some(pod => names.has(pod));
  }

  if (a.labelSelectors && b.labelSelectors) {
    return labelSelectorsCompatible(a.labelSelectors, b.labelSelectors);
  }

  return true;
}

/**
 * Short human-readable selector description for logs and CLI output
 */
export function describeSelector(selector: TargetSelector): string {
  const parts: string[] = [];
  if (selector.pods && selector.pods.length > 0) {
    parts.push(`pods=${selector.pods.join(',')}`);
  }
  if (selector.labelSelectors) {
    const labels = Object.entries(selector.labelSelectors)
      .map(([key, value]) => `${key}=${value}`)
      .join(',');
    parts.push(`labels=${labels}`);
  }
  return parts.length > 0 ? parts.join(' ') : '<empty>';
}
