import type { AttributeTree, AttributeValue } from './executor-interface.js';

export function isAttributeTree(value: AttributeValue | undefined): value is AttributeTree {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// Look up a dotted path such as "cloud.public_ipv4".
export function getAttribute(tree: AttributeTree, path: string): AttributeValue | undefined {
  let current: AttributeValue | undefined = tree;
  for (const segment of path.split('.')) {
    if (!isAttributeTree(current)) {
      return undefined;
    }
    current = current[segment];
  }
  return current;
}

export function getStringAttribute(tree: AttributeTree, path: string): string | undefined {
  const value = getAttribute(tree, path);
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

/**
 * Set a value at a dotted path, creating intermediate objects as needed.
 * A non-object found along the way is replaced.
 */
export function setAttribute(tree: AttributeTree, path: string, value: AttributeValue): AttributeTree {
  const segments = path.split('.');
  const leaf = segments.pop();
  if (!leaf) {
    throw new Error(`Invalid attribute path: "${path}"`);
  }

  let current = tree;
  for (const segment of segments) {
    const next = current[segment];
    if (isAttributeTree(next)) {
      current = next;
    } else {
      const created: AttributeTree = {};
      current[segment] = created;
      current = created;
    }
  }
  current[leaf] = value;
  return tree;
}
