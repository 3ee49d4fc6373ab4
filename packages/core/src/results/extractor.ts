import { promises as fs } from 'fs';
import path from 'path';
import yaml from 'js-yaml';
import { z } from 'zod';
import {
  CHALLENGE_STATUSES,
  challengeResult,
  ExtractionError,
  type ChallengeResult,
} from '@evaluator/shared';
import type { EvaluationWorkspace } from '@evaluator/exec';

export const RESULTS_FILENAME = 'challenge_results.yaml';

const ResultsFileSchema = z
  .object({
    status: z.enum(CHALLENGE_STATUSES),
    msg: z.string().nullish(),
    scores: z.record(z.number()).nullish(),
  })
  .passthrough();

export function resultsPath(workspace: EvaluationWorkspace): string {
  return path.join(workspace.dirs.results, RESULTS_FILENAME);
}

/**
 * Reads the structured outcome the evaluator container leaves in the
 * shared `results` directory.
 */
export class ResultExtractor {
  async hasResults(workspace: EvaluationWorkspace): Promise<boolean> {
    try {
      await fs.access(resultsPath(workspace));
      return true;
    } catch {
      return false;
    }
  }

  async extract(workspace: EvaluationWorkspace): Promise<ChallengeResult> {
    const filePath = resultsPath(workspace);

    let parsed: unknown;
    try {
      parsed = yaml.load(await fs.readFile(filePath, 'utf8'));
    } catch (error) {
      throw new ExtractionError(`Could not load results file ${filePath}`, { cause: error });
    }

    const result = ResultsFileSchema.safeParse(parsed);
    if (!result.success) {
      const issues = result.error.issues
        .map((i) => `- ${i.path.join('.') || '(root)'}: ${i.message}`)
        .join('\n');
      throw new ExtractionError(`Invalid results file ${filePath}:\n${issues}`, {
        cause: result.error,
      });
    }

    return challengeResult(result.data.status, result.data.msg ?? '', result.data.scores ?? {});
  }
}
