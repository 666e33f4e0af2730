/**
 * Pipeline Timer Utility
 * Tracks execution time of each node in one pipeline walk
 */

import type { Logger } from 'pino';

export interface TimingEntry {
  name: string;
  startTime: number;
  endTime?: number;
  durationMs?: number;
}

export interface StepSummary {
  step: string;
  durationMs: number;
  durationFormatted: string;
}

export interface PipelineSummary {
  pipeline: string;
  totalDurationMs: number;
  totalDurationFormatted: string;
  steps: StepSummary[];
}

/**
 * Format milliseconds to human-readable string
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms.toFixed(0)}ms`;
  } else if (ms < 60000) {
    return `${(ms / 1000).toFixed(2)}s`;
  } else {
    const minutes = Math.floor(ms / 60000);
    const seconds = ((ms % 60000) / 1000).toFixed(1);
    return `${minutes}m ${seconds}s`;
  }
}

/**
 * Pipeline Timer - one instance per execution, never shared
 */
export class PipelineTimer {
  private readonly pipelineStart: number;
  private currentStep: string | null = null;
  private steps: TimingEntry[] = [];

  constructor(
    private readonly pipeline: string,
    private readonly logger: Logger
  ) {
    this.pipelineStart = Date.now();
  }

  /**
   * Start timing a node; ends the previous one if still open
   */
  startStep(stepName: string): void {
    if (this.currentStep) {
      this.endStep();
    }

    this.currentStep = stepName;
    this.steps.push({ name: stepName, startTime: Date.now() });
    this.logger.debug({ pipeline: this.pipeline, node: stepName }, `Node started: ${stepName}`);
  }

  /**
   * End timing the current node
   */
  endStep(): void {
    if (!this.currentStep) return;

    const entry = this.steps[this.steps.length - 1];
    if (entry && entry.name === this.currentStep) {
      entry.endTime = Date.now();
      entry.durationMs = entry.endTime - entry.startTime;

      this.logger.debug(
        {
          pipeline: this.pipeline,
          node: entry.name,
          durationMs: entry.durationMs,
        },
        `Node completed: ${entry.name} (${formatDuration(entry.durationMs)})`
      );
    }

    this.currentStep = null;
  }

  /**
   * Get summary of completed nodes
   */
  getSummary(): PipelineSummary {
    if (this.currentStep) {
      this.endStep();
    }

    const totalDurationMs = Date.now() - this.pipelineStart;
    const steps: StepSummary[] = [];
    for (const entry of this.steps) {
      if (entry.durationMs !== undefined) {
        steps.push({
          step: entry.name,
          durationMs: entry.durationMs,
          durationFormatted: formatDuration(entry.durationMs),
        });
      }
    }

    return {
      pipeline: this.pipeline,
      totalDurationMs,
      totalDurationFormatted: formatDuration(totalDurationMs),
      steps,
    };
  }
}
