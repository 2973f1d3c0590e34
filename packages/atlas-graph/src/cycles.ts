import type { ReferenceType } from '@atlas/core';

export interface Cycle {
  /** Members in traversal order, rotated to start at the smallest notation */
  members: string[];
  /** Reference type of each hop; `types[i]` leads from `members[i]` to the next */
  types: ReferenceType[];
}

interface CycleEdge {
  target: string;
  type: ReferenceType;
}

type Successors = (notation: string) => readonly CycleEdge[];

const WHITE = 0;
const GRAY = 1;
const BLACK = 2;

/**
 * Report each distinct cycle once. A three-color depth-first search finds the
 * cycles closed by back edges; any node that sits on a cycle the search did
 * not close (reachable only through an already finished node) gets its
 * shortest cycle added, so every self-reachable node appears in some report.
 */
export function findCycles(nodes: readonly string[], successors: Successors): Cycle[] {
  const known = new Set(nodes);
  const next = (n: string): CycleEdge[] => successors(n).filter((e) => known.has(e.target));
  const color = new Map<string, number>();
  const found = new Map<string, Cycle>();

  for (const start of nodes) {
    if ((color.get(start) ?? WHITE) !== WHITE) continue;

    const path: string[] = [];
    const pathTypes: ReferenceType[] = [];
    const stack: Array<{ node: string; edges: CycleEdge[]; index: number }> = [];

    const enter = (node: string): void => {
      color.set(node, GRAY);
      path.push(node);
      stack.push({ node, edges: next(node), index: 0 });
    };
    enter(start);

    while (stack.length > 0) {
      const frame = stack[stack.length - 1];
      if (!frame) break;
      const edge = frame.edges[frame.index];
      if (!edge) {
        color.set(frame.node, BLACK);
        stack.pop();
        path.pop();
        pathTypes.pop();
        continue;
      }
      frame.index += 1;

      const state = color.get(edge.target) ?? WHITE;
      if (state === WHITE) {
        pathTypes.push(edge.type);
        enter(edge.target);
      } else if (state === GRAY) {
        const from = path.indexOf(edge.target);
        record(found, path.slice(from), [...pathTypes.slice(from), edge.type]);
      }
    }
  }

  const covered = new Set<string>();
  for (const cycle of found.values()) cycle.members.forEach((m) => covered.add(m));
  for (const node of nodes) {
    if (covered.has(node)) continue;
    const cycle = shortestCycleThrough(node, next);
    if (!cycle) continue;
    record(found, cycle.members, cycle.types);
    cycle.members.forEach((m) => covered.add(m));
  }

  return [...found.values()].sort((a, b) => compareMembers(a.members, b.members));
}

function shortestCycleThrough(start: string, next: (n: string) => CycleEdge[]): Cycle | null {
  const parent = new Map<string, { from: string; type: ReferenceType }>();
  const queue: string[] = [start];
  const seen = new Set<string>([start]);

  while (queue.length > 0) {
    const node = queue.shift();
    if (node === undefined) break;
    for (const edge of next(node)) {
      if (edge.target === start) {
        const members: string[] = [];
        const types: ReferenceType[] = [edge.type];
        let cursor = node;
        while (cursor !== start) {
          members.unshift(cursor);
          const step = parent.get(cursor);
          if (!step) break;
          types.unshift(step.type);
          cursor = step.from;
        }
        members.unshift(start);
        return { members, types };
      }
      if (seen.has(edge.target)) continue;
      seen.add(edge.target);
      parent.set(edge.target, { from: node, type: edge.type });
      queue.push(edge.target);
    }
  }
  return null;
}

function record(found: Map<string, Cycle>, members: string[], types: ReferenceType[]): void {
  const cycle = canonicalize(members, types);
  const key = cycle.members.join('\u0000');
  if (!found.has(key)) found.set(key, cycle);
}

/** Rotate so the smallest member leads; the same cycle always yields the same key */
export function canonicalize(members: string[], types: ReferenceType[]): Cycle {
  let pivot = 0;
  members.forEach((m, i) => {
    const best = members[pivot] ?? m;
    if (m < best) pivot = i;
  });
  return {
    members: [...members.slice(pivot), ...members.slice(0, pivot)],
    types: [...types.slice(pivot), ...types.slice(0, pivot)],
  };
}

function compareMembers(a: string[], b: string[]): number {
  const len = Math.min(a.length, b.length);
  for (let i = 0; i < len; i++) {
    const x = a[i] ?? '';
    const y = b[i] ?? '';
    if (x !== y) return x < y ? -1 : 1;
  }
  return a.length - b.length;
}
