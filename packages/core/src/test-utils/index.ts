export {
  TEST_CLASSIFIER_OPTIONS,
  createTestIndex,
  fsError,
  touch,
  withContentTree,
  writeTree,
  type TreeSpec,
} from "./content-tree.js";
export { createTestContext, createTestRequest } from "./request.js";
