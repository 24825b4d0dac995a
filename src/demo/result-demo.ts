import { Result } from '../types/result';
import { ResultBindings } from '../types/binding';
import { Ok, Err, match, release } from '../utils/result';
import { debugResult } from '../format/result';
import { Writer } from '../writer';
import { ExitCode, Output, exitCodeBinding, outputBinding, strBinding } from './exit-code';

const messageBindings: ResultBindings<string, string> = {
  ok: strBinding,
  err: strBinding,
};

const commandBindings: ResultBindings<Output, ExitCode> = {
  ok: outputBinding,
  err: exitCodeBinding,
};

/**
 * Build a few Results, dispatch on two of them and write all three debug
 * renderings.
 */
export function runResultDemo(writer: Writer): void {
  const valid: Result<string, string> = Ok('Operation succeeded');
  const invalid: Result<string, string> = Err('Operation failed');
  const notFound: Result<Output, ExitCode> = Err(ExitCode.CommandNotFound);

  const onSuccess = (message: string): void => writer(`Success: ${message}\n`);
  const onFailure = (failure: string): void => writer(`Failure: ${failure}\n`);

  match(valid, onSuccess, onFailure);
  match(invalid, onSuccess, onFailure);

  writer(`${debugResult(valid, messageBindings)}\n`);
  writer(`${debugResult(invalid, messageBindings)}\n`);
  writer(`${debugResult(notFound, commandBindings)}\n`);

  release(valid);
  release(invalid);
  release(notFound);
}
