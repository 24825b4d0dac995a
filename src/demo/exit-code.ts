import { aliasBinding, enumBinding, stringBinding } from '../utils/bindings';

/**
 * Exit status of a shell command, used as the error type in the Result demo.
 */
export enum ExitCode {
  Success = 0,
  CommandNotFound = 1,
  PermissionDenied = 2,
  UnknownError = 3,
}

const exitCodeLabels: Readonly<Record<ExitCode, string>> = {
  [ExitCode.Success]: 'Success',
  [ExitCode.CommandNotFound]: 'Command Not Found',
  [ExitCode.PermissionDenied]: 'Permission Denied',
  [ExitCode.UnknownError]: 'Unknown Error',
};

export const exitCodeBinding = enumBinding<ExitCode>(
  'ExitCode',
  exitCodeLabels,
  ExitCode.Success
);

/** Captured command output. */
export type Output = string;

export const outputBinding = aliasBinding<Output>(stringBinding, 'Output');

export const strBinding = aliasBinding(stringBinding, 'str');
