export type LeafKind = 'none' | 'outmost' | 'deep' | 'recursive';

export type TreeNode = {
  name: string;
  fileInfo: string;
  children: TreeNode[];
  leaf: LeafKind;
};

/** `called`: who calls the root (backtrace). `calling`: what the root calls. */
export type TreeDirection = 'called' | 'calling';
