/**
 * Input Validator
 * 
 * Checks that every input exists and is a regular file. Nothing is read or
 * written; the answer is only valid at the moment of the check.
 */

import { stat } from 'node:fs/promises';
import {
  MissingInputError,
  NoInputFilesError,
  NotAFileError,
  err,
  ok,
  type Result,
  type ValidationError,
} from '@vmerger/core';

export async function validateInputs(
  paths: readonly string[]
): Promise<Result<void, ValidationError>> {
  if (paths.length === 0) {
    return err(new NoInputFilesError());
  }

  for (const path of paths) {
    let isFile: boolean;
    try {
      isFile = (await stat(path)).isFile();
    } catch (error) {
      // Any stat failure (ENOENT, EACCES, ENOTDIR...) counts as missing
      return err(new MissingInputError(path, error));
    }

    if (!isFile) {
      return err(new NotAFileError(path));
    }
  }

  return ok(undefined);
}
