/**
 * Cycle detection over an adjacency view.
 */
import type { Adjacency } from './dependencies.js';
import type { CycleKind, DependencyCycle } from './types.js';

interface Frame {
  node: string;
  successors: readonly string[];
  next: number;
}

/**
 * Depth-first search with an explicit stack. Each back edge closes a cycle:
 * the current path from the first occurrence of the revisited node, with that
 * node repeated at the end.
 */
export function findCycles(adjacency: Adjacency, kind: CycleKind): DependencyCycle[] {
  const cycles: DependencyCycle[] = [];
  const visited = new Set<string>();
  const onStack = new Set<string>();
  const path: string[] = [];
  const frames: Frame[] = [];

  const enter = (node: string): void => {
    visited.add(node);
    onStack.add(node);
    path.push(node);
    frames.push({ node, successors: adjacency.get(node) ?? [], next: 0 });
  };

  for (const start of [...adjacency.keys()].sort()) {
    if (visited.has(start)) {
      continue;
    }
    enter(start);

    while (frames.length > 0) {
      const frame = frames[frames.length - 1];
      if (!frame) {
        break;
      }
      if (frame.next >= frame.successors.length) {
        frames.pop();
        path.pop();
        onStack.delete(frame.node);
        continue;
      }
      const successor = frame.successors[frame.next++];
      if (successor === undefined) {
        continue;
      }
      if (onStack.has(successor)) {
        cycles.push({ kind, path: [...path.slice(path.indexOf(successor)), successor] });
      } else if (!visited.has(successor)) {
        enter(successor);
      }
    }
  }

  return cycles;
}
