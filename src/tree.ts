/**
 * Comment tree model and the structural checks every delivered round must pass.
 */

export interface CommentNode {
  id: string;
  author: string;
  content: string;
  score: number;
  /** 0 for top-level comments, parent depth + 1 otherwise */
  depth: number;
  parentId: string | null;
  readonly isSynthetic: boolean;
  /** Archetype key the comment was generated with; synthetic comments only */
  archetype?: string;
  children: CommentNode[];
}

export interface Post {
  /** Reddit's id for the source post */
  id: string;
  title: string;
  body: string;
  author: string;
  subreddit: string;
  score: number;
  comments: readonly CommentNode[];
}

/** Depth-first, pre-order: every parent comes before its replies */
export function flattenTree(roots: readonly CommentNode[]): CommentNode[] {
  const out: CommentNode[] = [];
  const visit = (nodes: readonly CommentNode[]): void => {
    for (const node of nodes) {
      out.push(node);
      visit(node.children);
    }
  };
  visit(roots);
  return out;
}

export function countNodes(roots: readonly CommentNode[]): number {
  return flattenTree(roots).length;
}

export function findNode(roots: readonly CommentNode[], id: string): CommentNode | undefined {
  return flattenTree(roots).find(node => node.id === id);
}

/** Ancestors of `node`, root first */
export function ancestorChain(roots: readonly CommentNode[], node: CommentNode): CommentNode[] {
  const byId = new Map(flattenTree(roots).map(n => [n.id, n]));
  const chain: CommentNode[] = [];
  let parentId = node.parentId;
  while (parentId !== null) {
    const parent = byId.get(parentId);
    if (!parent || chain.includes(parent)) break;
    chain.unshift(parent);
    parentId = parent.parentId;
  }
  return chain;
}

/** Rewrite parentId and depth from the actual nesting */
export function relinkTree(roots: CommentNode[]): void {
  const visit = (nodes: CommentNode[], parent: CommentNode | null): void => {
    for (const node of nodes) {
      node.parentId = parent ? parent.id : null;
      node.depth = parent ? parent.depth + 1 : 0;
      visit(node.children, node);
    }
  };
  visit(roots, null);
}

export function countProvenance(roots: readonly CommentNode[]): { real: number; synthetic: number } {
  let real = 0;
  let synthetic = 0;
  for (const node of flattenTree(roots)) {
    if (node.isSynthetic) synthetic++;
    else real++;
  }
  return { real, synthetic };
}

/**
 * Structural problems in a tree: dangling or mismatched parent ids, wrong
 * depths, duplicate ids. An empty list means the tree is sound.
 */
export function findTreeProblems(roots: readonly CommentNode[]): string[] {
  const problems: string[] = [];
  const seen = new Set<string>();

  const visit = (nodes: readonly CommentNode[], parent: CommentNode | null): void => {
    for (const node of nodes) {
      if (seen.has(node.id)) {
        problems.push(`duplicate id ${node.id}`);
      }
      seen.add(node.id);

      const expectedParent = parent ? parent.id : null;
      if (node.parentId !== expectedParent) {
        problems.push(`${node.id}: parent_id ${node.parentId} but nested under ${expectedParent}`);
      }
      const expectedDepth = parent ? parent.depth + 1 : 0;
      if (node.depth !== expectedDepth) {
        problems.push(`${node.id}: depth ${node.depth}, expected ${expectedDepth}`);
      }
      visit(node.children, node);
    }
  };

  visit(roots, null);
  return problems;
}

/** Deep-freeze a finished tree so provenance cannot drift after assembly */
export function freezeTree(roots: CommentNode[]): readonly CommentNode[] {
  for (const node of roots) {
    freezeTree(node.children);
    Object.freeze(node.children);
    Object.freeze(node);
  }
  return Object.freeze(roots);
}
