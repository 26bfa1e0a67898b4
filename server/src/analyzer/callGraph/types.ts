import type { NameIndex } from './nameIndex.js';

export type SourceLocation = {
  path: string;
  line: number; // 1-based
};

export type FunctionDefinition = {
  qualifiedName: string;
  simpleName: string;
  location: SourceLocation;
  bodyText: string;
  calls: string[]; // every call expression in the body, duplicates kept
};

export type CallerNode = {
  name: string;
  simpleName: string;
  fileInfo: string; // "path:line"
  calleeNames: string[];
  calleeSimpleNames: string[];
};

export type CallGraph = {
  definitionsOf: NameIndex;
  callersOf: NameIndex;
};
