export { DefinitionError, type DefinitionErrorCode } from "./errors.ts";

export {
  FileScriptSource,
  InMemoryScriptSource,
  type ScriptSource,
} from "./script-source.ts";

export {
  loadPipelineDefinition,
  parsePipelineDocument,
  resolvePipelineDefinition,
  substituteParams,
  type ActionSource,
  type PipelineDocument,
  type ResolveOptions,
  type StageDocument,
} from "./pipeline-loader.ts";

export { toWarehousePath } from "./paths.ts";
