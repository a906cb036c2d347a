/**
 * Traversal planner.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * FROM A CLEAN GRAPH TO A STUDY PLAN
 * ═══════════════════════════════════════════════════════════════════════════
 *
 * 1. SCOPE: every node, or (with `targets`) the targets, their descendants
 *    and everything they transitively require.
 *
 * 2. ORDER: Kahn's algorithm over prerequisite edges. When several nodes are
 *    eligible (all their prerequisites scheduled) the highest priority goes
 *    first; ties go to the earlier node in the document. No randomness, so
 *    the same input always yields the same plan.
 *
 * 3. BUDGET: the plan is the longest prefix of that order whose cumulative
 *    effort stays within the budget. The rest is reported as deferred.
 *
 * With no priorities and a budget that covers everything, the plan is the
 * handbook in document order.
 *
 * The planner expects a graph the validator found clean. It re-checks the
 * two conditions it cannot work around (dangling edges, prerequisite
 * cycles) and throws PlanningError instead of producing a partial order.
 */

import type { ContentGraph } from "../graph/graph.js";
import type { Diagnostic } from "../diagnostics/types.js";

export type PlanningErrorKind =
  | "CYCLIC_INPUT"
  | "DANGLING_INPUT"
  | "UNKNOWN_TARGET"
  | "INVALID_OPTIONS";

export class PlanningError extends Error {
  public readonly kind: PlanningErrorKind;
  public readonly nodeIds: readonly string[];

  constructor(kind: PlanningErrorKind, message: string, nodeIds: readonly string[] = []) {
    super(message);
    this.name = "PlanningError";
    this.kind = kind;
    this.nodeIds = nodeIds;
  }

  format(): string {
    return `PLANNING ERROR [${this.kind}]: ${this.message}`;
  }
}

export interface PlanOptions {
  /** Total effort units available; Infinity plans everything */
  budget: number;
  /** Effort per node id; others cost `defaultEffort` */
  effortOverrides?: Readonly<Record<string, number>>;
  /** Priority per node id (default 0); higher goes first when eligible */
  priorityOverrides?: Readonly<Record<string, number>>;
  /** Default: 1 */
  defaultEffort?: number;
  /** Plan only what these nodes need */
  targets?: readonly string[];
}

export interface StudyPlanStep {
  readonly nodeId: string;
  readonly title: string;
  readonly effort: number;
  readonly cumulativeCost: number;
}

export interface StudyPlan {
  readonly steps: readonly StudyPlanStep[];
  readonly budget: number;
  /** Cumulative cost of the last step (0 for an empty plan) */
  readonly totalCost: number;
  /** In-scope nodes that did not fit, in the order they would follow */
  readonly deferred: readonly string[];
  readonly scope: "all" | "targets";
}

export interface PlanResult {
  plan: StudyPlan;
  diagnostics: Diagnostic[];
}

function isPositive(value: number): boolean {
  return !Number.isNaN(value) && value > 0;
}

function checkOptions(options: PlanOptions, defaultEffort: number): void {
  if (!isPositive(options.budget)) {
    throw new PlanningError("INVALID_OPTIONS", `Budget must be positive, got ${options.budget}`);
  }
  if (!isPositive(defaultEffort) || !Number.isFinite(defaultEffort)) {
    throw new PlanningError(
      "INVALID_OPTIONS",
      `Default effort must be a positive number, got ${defaultEffort}`
    );
  }
  for (const [id, effort] of Object.entries(options.effortOverrides ?? {})) {
    if (!isPositive(effort) || !Number.isFinite(effort)) {
      throw new PlanningError("INVALID_OPTIONS", `Effort for "${id}" must be positive, got ${effort}`, [id]);
    }
  }
}

function checkDanglingEdges(graph: ContentGraph): void {
  const dangling = graph.edges.filter((edge) => !graph.has(edge.source) || !graph.has(edge.target));
  if (dangling.length > 0) {
    throw new PlanningError(
      "DANGLING_INPUT",
      `Graph has ${dangling.length} edge(s) with missing endpoints: ${dangling.map((e) => e.id).join(", ")}`,
      dangling.map((edge) => edge.declaredIn ?? edge.source)
    );
  }
}

/**
 * Node ids in scope, in document order.
 */
function collectScope(graph: ContentGraph, targets: readonly string[] | undefined): string[] {
  if (targets === undefined) {
    return graph.nodes.map((node) => node.id);
  }

  const unknown = targets.filter((id) => !graph.has(id));
  if (unknown.length > 0) {
    throw new PlanningError("UNKNOWN_TARGET", `Unknown target(s): ${unknown.join(", ")}`, unknown);
  }

  const inScope = new Set<string>();
  const work = [...targets];
  while (work.length > 0) {
    const id = work.pop();
    if (id === undefined || inScope.has(id)) continue;
    inScope.add(id);
    work.push(...graph.descendantsOf(id), ...graph.prerequisitesOf(id));
  }

  return graph.nodes.map((node) => node.id).filter((id) => inScope.has(id));
}

/**
 * Prerequisite-respecting order of the scope, highest priority first among
 * eligible nodes, document order on ties.
 *
 * @throws PlanningError(CYCLIC_INPUT) if some nodes can never become eligible
 */
function orderScope(
  graph: ContentGraph,
  scope: readonly string[],
  priorityOf: (id: string) => number
): string[] {
  const inScope = new Set(scope);
  const remaining = new Map<string, number>();

  for (const id of scope) {
    const required = graph.prerequisitesOf(id).filter((target) => inScope.has(target));
    remaining.set(id, required.length);
  }

  const eligible = scope.filter((id) => remaining.get(id) === 0);
  const order: string[] = [];

  while (eligible.length > 0) {
    let best = 0;
    for (let i = 1; i < eligible.length; i++) {
      const candidate = eligible[i];
      const current = eligible[best];
      if (candidate === undefined || current === undefined) continue;
      const byPriority = priorityOf(candidate) - priorityOf(current);
      if (
        byPriority > 0 ||
        (byPriority === 0 && graph.documentIndexOf(candidate) < graph.documentIndexOf(current))
      ) {
        best = i;
      }
    }

    const [next] = eligible.splice(best, 1);
    if (next === undefined) break;
    order.push(next);

    for (const dependent of graph.dependentsOf(next)) {
      const count = remaining.get(dependent);
      if (count === undefined) continue;
      remaining.set(dependent, count - 1);
      if (count - 1 === 0) {
        eligible.push(dependent);
      }
    }
  }

  if (order.length < scope.length) {
    const scheduled = new Set(order);
    const blocked = scope.filter((id) => !scheduled.has(id));
    throw new PlanningError(
      "CYCLIC_INPUT",
      `Prerequisite cycle: ${blocked.length} node(s) can never be scheduled (${blocked.join(", ")})`,
      blocked
    );
  }

  return order;
}

/**
 * Costs are sums of fractional efforts, so a total that lands on the budget
 * up to rounding error (0.1 + 0.2 against 0.3) still fits.
 */
function exceedsBudget(total: number, budget: number): boolean {
  return total - budget > Number.EPSILON * Math.max(1, Math.abs(budget));
}

function overrideDiagnostics(graph: ContentGraph, options: PlanOptions): Diagnostic[] {
  const diagnostics: Diagnostic[] = [];
  const sources: Array<[string, Readonly<Record<string, number>> | undefined]> = [
    ["effortOverrides", options.effortOverrides],
    ["priorityOverrides", options.priorityOverrides],
  ];

  for (const [name, overrides] of sources) {
    for (const id of Object.keys(overrides ?? {})) {
      if (graph.has(id)) continue;
      diagnostics.push({
        severity: "warning",
        kind: "UNKNOWN_OVERRIDE",
        nodeIds: [id],
        edgeIds: [],
        message: `${name} names "${id}", which is not in the graph`,
        suggestion: "Check the id against the built graph; ids include sibling ordinals",
        stage: "planner",
      });
    }
  }

  return diagnostics;
}

/**
 * Compute a study plan and the planner's findings.
 *
 * @throws PlanningError on invalid options, dangling edges, unknown targets
 *   or prerequisite cycles
 */
export function createStudyPlan(graph: ContentGraph, options: PlanOptions): PlanResult {
  const defaultEffort = options.defaultEffort ?? 1;
  checkOptions(options, defaultEffort);
  checkDanglingEdges(graph);

  // Own keys only: ids such as "constructor" must not hit Object.prototype.
  const efforts = new Map(Object.entries(options.effortOverrides ?? {}));
  const priorities = new Map(Object.entries(options.priorityOverrides ?? {}));
  const effortOf = (id: string): number => efforts.get(id) ?? defaultEffort;
  const priorityOf = (id: string): number => priorities.get(id) ?? 0;

  const scope = collectScope(graph, options.targets);
  const order = orderScope(graph, scope, priorityOf);

  const steps: StudyPlanStep[] = [];
  let cumulative = 0;
  for (const id of order) {
    const effort = effortOf(id);
    if (exceedsBudget(cumulative + effort, options.budget)) break;
    cumulative += effort;
    steps.push({
      nodeId: id,
      title: graph.getById(id)?.title ?? id,
      effort,
      cumulativeCost: cumulative,
    });
  }

  const deferred = order.slice(steps.length);
  const diagnostics = overrideDiagnostics(graph, options);
  const nextId = deferred[0];

  if (nextId !== undefined) {
    diagnostics.push({
      severity: "warning",
      kind: "PLAN_TRUNCATED",
      nodeIds: [nextId],
      edgeIds: [],
      message: `Budget ${options.budget} covers ${steps.length} of ${order.length} node(s); next is "${nextId}" (effort ${effortOf(nextId)}) with ${Math.max(0, options.budget - cumulative)} left`,
      suggestion: "Raise the budget, lower effort estimates, or narrow the targets",
      stage: "planner",
    });
  }

  return {
    plan: {
      steps,
      budget: options.budget,
      totalCost: cumulative,
      deferred,
      scope: options.targets === undefined ? "all" : "targets",
    },
    diagnostics,
  };
}

/**
 * Compute a study plan.
 *
 * @throws PlanningError, see createStudyPlan
 */
export function planStudy(graph: ContentGraph, options: PlanOptions): StudyPlan {
  return createStudyPlan(graph, options).plan;
}
