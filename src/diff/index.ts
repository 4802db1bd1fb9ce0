export { diff, isEmptyDiff, countPatches } from './diff';
export { diffProps, propsEqual, type PropDelta } from './props';
export type {
  Patch,
  PatchPath,
  PatchType,
  CreatePatch,
  RemovePatch,
  ReplacePatch,
  UpdatePropsPatch,
  SetTextPatch,
  ReorderPatch,
} from './types';
