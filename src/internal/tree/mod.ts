export { ROOT_TAG_NAME, buildTreeFromMarkup, buildTreeFromTokens } from "./build.js";
export { normalizeTree } from "./normalize.js";

export type {
  MarkupTreeBuildResult,
  TreeBuildOptions,
  TreeBudgets,
  TreeBuildResult,
  TreeBuilderError,
  TreeBuilderErrorCode,
  TreeNode,
  TreeNodeElement,
  TreeNodeText,
  TreeSpan
} from "./types.js";
