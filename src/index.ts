export type {
  Result,
  Ok as OkResult,
  Err as ErrResult,
  Maybe,
} from './types/result';
export type { TypeFormatter, TypeBinding, ResultBindings } from './types/binding';
export type { ContainerError, ContainerErrorCode } from './types/errors';

export {
  Ok,
  Err,
  isOk,
  isErr,
  value,
  error,
  valueOr,
  errorOr,
  valueOrElse,
  errorOrElse,
  match,
  release,
  isReleased,
} from './utils/result';

export {
  stringBinding,
  numberBinding,
  booleanBinding,
  defineBinding,
  aliasBinding,
  enumBinding,
} from './utils/bindings';

export { FixedArray, MAX_ARRAY_SIZE } from './containers/FixedArray';

export {
  formatResult,
  debugResult,
  printResult,
  printlnResult,
} from './format/result';

export type { RenderConfig, RenderOptions } from './config';
export { RenderConfigSchema, resolveRenderConfig } from './config';

export type { Writer } from './writer';
export { stdoutWriter } from './writer';
