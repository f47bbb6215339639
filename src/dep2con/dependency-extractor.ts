/**
 * Constituency to dependency extraction.
 *
 * Reads a binary constituency tree back into a dependency tree. The head of
 * a branch is the head of its nucleus child, the left one when both children
 * are nuclei; the other child's head attaches to it under the branch's
 * relation. Attachments closer to the leaves get lower ranks.
 *
 * Inverse of TreeBuilder.convert except for multinuclear dependents attached
 * to the left of their head, which come back attached the other way round.
 *
 * @module dep2con/dependency-extractor
 */

import { StructuralError } from "../utils/errors.js";
import {
  FAKE_ROOT,
  NO_HEAD,
  type ConstituencyTree,
  type DependencyTree,
  type Nuclearity,
  type Unit,
} from "./types.js";

/** Label given to the edge from the fake root */
export const ROOT_RELATION = "ROOT";

export function toDependencyTree(ctree: ConstituencyTree, id?: string): DependencyTree {
  const units: Unit[] = [];
  const heads: number[] = [NO_HEAD];
  const labels: (string | null)[] = [null];
  const nuclearity: (Nuclearity | null)[] = [null];
  const attachments = new Map<number, number[]>();

  const visit = (node: ConstituencyTree, path: string): number => {
    if (node.kind === "leaf") {
      units.push(node.unit);
      heads.push(NO_HEAD);
      labels.push(null);
      nuclearity.push(null);
      return units.length;
    }

    const [left, right] = node.children;
    const leftHead = visit(left, `${path}.children[0]`);
    const rightHead = visit(right, `${path}.children[1]`);

    const headOnLeft = left.nuclearity === "Nucleus";
    if (!headOnLeft && right.nuclearity !== "Nucleus") {
      throw new StructuralError(`Branch at ${path} has no nucleus`, "INVALID_TREE", {
        documentId: id,
        path,
        nuclearity: [left.nuclearity, right.nuclearity],
      });
    }

    const [head, dependent, dependentTree] = headOnLeft
      ? [leftHead, rightHead, right]
      : [rightHead, leftHead, left];
    const dependentNuclearity = dependentTree.nuclearity;
    if (dependentNuclearity === "Root") {
      throw new StructuralError(`Root nuclearity below the top at ${path}`, "INVALID_TREE", {
        documentId: id,
        path,
      });
    }

    heads[dependent] = head;
    labels[dependent] = node.relation;
    nuclearity[dependent] = dependentNuclearity;
    const attached = attachments.get(head) ?? [];
    attached.push(dependent);
    attachments.set(head, attached);
    return head;
  };

  const root = visit(ctree, "tree");
  heads[root] = FAKE_ROOT;
  labels[root] = ROOT_RELATION;
  nuclearity[root] = "Nucleus";

  const ranks = new Array<number>(heads.length).fill(0);
  for (const dependents of attachments.values()) {
    dependents.forEach((dependent, rank) => {
      ranks[dependent] = rank;
    });
  }

  return { ...(id !== undefined ? { id } : {}), units, heads, labels, nuclearity, ranks };
}
