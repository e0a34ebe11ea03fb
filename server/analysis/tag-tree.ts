import type { TagNode, TagTree } from "./types";

export const HEADING_TAGS = ["h1", "h2", "h3", "h4", "h5", "h6"];

export function findAll(tree: TagTree, ...names: string[]): TagNode[] {
  return tree.nodes.filter((node) => names.includes(node.name));
}

export function findFirst(tree: TagTree, name: string, predicate?: (node: TagNode) => boolean): TagNode | undefined {
  return tree.nodes.find((node) => node.name === name && (!predicate || predicate(node)));
}

export function attr(node: TagNode, name: string): string | undefined {
  return node.attributes[name];
}

export function hasToken(node: TagNode, name: string, token: string): boolean {
  const value = attr(node, name);
  if (!value) return false;
  return value
    .toLowerCase()
    .split(/\s+/)
    .includes(token.toLowerCase());
}

export function headingLevel(node: TagNode): number | null {
  const match = node.name.match(/^h([1-6])$/);
  return match ? parseInt(match[1], 10) : null;
}
