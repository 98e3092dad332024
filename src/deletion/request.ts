/**
 * Deletion request file: { "files": [path, ...], "decided_by": "operator" }
 * Produced by the external selection step and treated as untrusted input
 */

import { readFile } from 'fs/promises';
import { CorruptArtifactError, describeError, errorCode } from '../utils/errors.js';
import { writeJsonAtomic } from '../utils/fs.js';
import { type DeletionRequest, isValidDeletionRequestFile } from './types.js';

export async function readDeletionRequest(path: string): Promise<DeletionRequest> {
  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch (error) {
    if (errorCode(error) === 'ENOENT') {
      throw CorruptArtifactError.fromMissing('deletion request', path);
    }
    throw CorruptArtifactError.fromParseFailure('deletion request', path, describeError(error));
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    throw CorruptArtifactError.fromParseFailure('deletion request', path, describeError(error));
  }

  if (!isValidDeletionRequestFile(parsed)) {
    throw CorruptArtifactError.fromParseFailure(
      'deletion request',
      path,
      'Expected { "files": [path, ...] } with non-empty string paths'
    );
  }

  return { files: parsed.files, decidedBy: 'operator' };
}

export async function writeDeletionRequest(path: string, request: DeletionRequest): Promise<void> {
  await writeJsonAtomic(path, { files: request.files, decided_by: request.decidedBy });
}
