export {
  DISCARD,
  ignore,
  keysPattern,
  seqPattern,
  shorthandName,
  sym,
  validatePattern,
  type BindingPattern,
  type KeyEntry,
  type KeysPattern,
  type KeysPatternOptions,
  type LeafPattern,
  type SeqPattern,
} from './pattern';
export { patternFromForm } from './form';
export {
  bindArguments,
  compilePattern,
  destructure,
  runPlan,
  toRecord,
  type BindingPlan,
  type Bindings,
  type CompileOptions,
  type DestructureOptions,
  type Extraction,
  type PlanStep,
} from './compile';
