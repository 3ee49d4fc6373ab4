import pc from 'picocolors';
import type { ChallengeStatus } from '@evaluator/shared';
import type { PassOutcome } from '@evaluator/core';

export interface RunSummary {
  outcomes: PassOutcome[];
}

function statusColor(status: ChallengeStatus): (text: string) => string {
  switch (status) {
    case 'success':
      return pc.green;
    case 'failed':
      return pc.yellow;
    case 'error':
      return pc.red;
  }
}

function firstLine(text: string): string {
  return text.split('\n', 1)[0] ?? '';
}

export class OutputRenderer {
  constructor(private isJson: boolean) {}

  render(summary: RunSummary): void {
    if (this.isJson) {
      console.log(JSON.stringify({ outcomes: summary.outcomes.map(toJson) }, null, 2));
    } else {
      summary.outcomes.forEach((outcome) => this.renderHuman(outcome));
    }
  }

  private renderHuman(outcome: PassOutcome): void {
    switch (outcome.kind) {
      case 'nothing':
        console.log(pc.gray(`No job evaluated${outcome.reason ? `: ${outcome.reason}` : '.'}`));
        break;
      case 'reported': {
        const { status, message } = outcome.result;
        const icon = status === 'success' ? pc.green('✅') : pc.red('❌');
        console.log(`${icon} Job ${outcome.jobId}: ${statusColor(status)(status)}`);
        if (message) {
          console.log(`  ${pc.bold('Message:')} ${firstLine(message)}`);
        }
        this.renderScores(outcome.result.scores);
        break;
      }
      case 'report-failed':
        console.log(
          `${pc.red('❌')} Job ${outcome.jobId}: evaluated as ${outcome.result.status}, but the report failed.`,
        );
        console.log(`  ${pc.bold('Error:')} ${outcome.error.message}`);
        break;
    }
  }

  private renderScores(scores: Readonly<Record<string, number>>): void {
    const entries = Object.entries(scores).sort(([a], [b]) => a.localeCompare(b));
    if (entries.length === 0) {
      return;
    }
    console.log(pc.bold('  Scores:'));
    entries.forEach(([name, value]) => console.log(`    - ${name}: ${value}`));
  }

  log(message: string): void {
    if (this.isJson) {
      // JSON mode should not have logs
    } else {
      console.log(pc.gray(message));
    }
  }
}

function toJson(outcome: PassOutcome): Record<string, unknown> {
  if (outcome.kind === 'report-failed') {
    return { ...outcome, error: outcome.error.message };
  }
  return { ...outcome };
}
