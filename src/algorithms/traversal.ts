interface VisitBase<K> {
  readonly key: K;
  /** Edges between the start vertex and this one along the traversal tree. */
  readonly depth: number;
}

/** The start vertex of a traversal. */
export interface RootVisit<K> extends VisitBase<K> {
  readonly root: true;
}

/** A vertex reached through an edge from `parent`. */
export interface ChildVisit<K> extends VisitBase<K> {
  readonly root: false;
  readonly parent: K;
}

/** One step of a traversal. */
export type TraversalVisit<K> = RootVisit<K> | ChildVisit<K>;

export type TraversalStrategy = "bfs" | "dfs";

/** Discovery link of a vertex; the start vertex has none. */
export interface ParentLink<K> {
  readonly parent: K;
}

/**
 * Rebuilds the path ending at `goal` by following discovery links back to the
 * vertex without one.
 */
export function rebuildPath<K>(links: ReadonlyMap<K, ParentLink<K>>, goal: K): K[] {
  const path: K[] = [goal];
  let link = links.get(goal);
  while (link !== undefined) {
    path.push(link.parent);
    link = links.get(link.parent);
  }
  return path.reverse();
}
