import type { TreeNode } from './types.js';

export type FormatTreeOptions = {
  verbose?: boolean;
  leafKinds?: boolean;
};

function labelOf(node: TreeNode, options: FormatTreeOptions): string {
  let label = node.name;
  if (options.verbose && node.fileInfo.length > 0) label = `${label}\t[${node.fileInfo}]`;
  if (options.leafKinds && node.leaf !== 'none') label = `${label} (${node.leaf})`;
  return label;
}

/** Renders the tree the way `tree(1)` does, one array entry per output line. */
export function formatTree(root: TreeNode, options: FormatTreeOptions = {}): string[] {
  const lines = [labelOf(root, options)];
  const lastIndex = root.children.length - 1;

  root.children.forEach((child, i) => {
    const [first, ...rest] = formatTree(child, options);
    const isLast = i === lastIndex;
    lines.push(`${isLast ? '└── ' : '├── '}${first ?? ''}`);
    for (const line of rest) lines.push(`${isLast ? '    ' : '│   '}${line}`);
  });

  return lines;
}
