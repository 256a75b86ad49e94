/**
 * Dependency Graph
 *
 * Stable topological sort of the ordinary steps of one stage. Registration
 * order is the fallback order: nodes are visited in that order and each
 * node's predecessors are emitted (in the order the edges were added) before
 * the node itself.
 */

import { DependencyCycleError, UnknownStepError } from '../utils/errors.js';
import { createChildLogger } from '../utils/logger.js';
import { normalizeStepId, type Dependency, type RegisterStep } from './step.js';

const logger = createChildLogger({ service: 'dependency-graph' });

type VisitState = 'unvisited' | 'visiting' | 'visited';

class Node {
  /** Nodes that must be emitted before this one */
  readonly previous: Node[] = [];
  state: VisitState = 'unvisited';

  constructor(readonly step: RegisterStep) {}

  get stepId(): string {
    return this.step.stepId;
  }
}

/**
 * Sort the steps of one stage according to their before/after constraints
 *
 * @param steps - Ordinary (non-connector) steps of the stage, in registration order
 * @returns The same steps, ordered
 * @throws UnknownStepError if an enforced constraint names a step not in the stage
 * @throws DependencyCycleError if the constraints form a cycle
 */
export function sortStageSteps(steps: readonly RegisterStep[]): RegisterStep[] {
  if (steps.length === 0) {
    return [];
  }

  // Step 1: one node per step, preserving registration order
  const nameToNode = new Map<string, Node>();
  const allNodes: Node[] = [];
  for (const step of steps) {
    const node = new Node(step);
    nameToNode.set(normalizeStepId(step.stepId), node);
    allNodes.push(node);
  }

  // Step 2: edges from insertBefore/insertAfter
  for (const node of allNodes) {
    for (const before of node.step.befores) {
      const referenced = resolve(before, nameToNode, 'insertbefore');
      referenced?.previous.push(node);
    }
    for (const after of node.step.afters) {
      const referenced = resolve(after, nameToNode, 'insertafter');
      if (referenced) {
        node.previous.push(referenced);
      }
    }
  }

  // Step 3: depth-first visit
  const output: RegisterStep[] = [];
  for (const node of allNodes) {
    visit(node, output, []);
  }

  return output;
}

function resolve(dependency: Dependency, nameToNode: Map<string, Node>, kind: string): Node | undefined {
  const referenced = nameToNode.get(normalizeStepId(dependency.dependsOnId));
  if (referenced) {
    return referenced;
  }

  if (!dependency.enforce) {
    logger.debug(
      { stepId: dependency.dependantId, dependsOn: dependency.dependsOnId, direction: dependency.direction },
      'Ignoring ordering constraint on missing step'
    );
    return undefined;
  }

  const currentStepIds = `'${[...nameToNode.values()].map((n) => n.stepId).join("', '")}'`;
  throw new UnknownStepError(
    dependency.dependsOnId,
    `Registration '${dependency.dependsOnId}' specified in the ${kind} of the '${dependency.dependantId}' step does not exist. Current StepIds: ${currentStepIds}`
  );
}

function visit(node: Node, output: RegisterStep[], path: Node[]): void {
  if (node.state === 'visited') {
    return;
  }

  if (node.state === 'visiting') {
    const start = path.indexOf(node);
    const cycle = [...path.slice(start), node].map((n) => n.stepId);
    throw new DependencyCycleError(cycle);
  }

  node.state = 'visiting';
  path.push(node);
  for (const previous of node.previous) {
    visit(previous, output, path);
  }
  path.pop();
  node.state = 'visited';

  output.push(node.step);
}
