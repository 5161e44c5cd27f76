/**
 * Phase Progress Indicators
 * Spinner with elapsed time for the build, test and report phases
 */

import ora, { type Ora } from "ora";
import chalk from "chalk";

export type ProgressPhase = "build" | "test" | "report";

const PHASE_LABELS: Record<ProgressPhase, string> = {
  build: "Building target",
  test: "Running hardware tests",
  report: "Reporting result",
};

const PHASE_ICONS: Record<ProgressPhase, string> = {
  build: "🔨",
  test: "🧪",
  report: "📡",
};

/**
 * What the pipeline needs from a progress display
 */
export interface PhaseProgress {
  startPhase(phase: ProgressPhase, detail?: string): void;
  succeed(message?: string): void;
  fail(message: string): void;
  stop(): void;
}

/**
 * Format elapsed time as human-readable string
 */
export function formatElapsed(ms: number): string {
  const seconds = Math.floor(ms / 1000);
  if (seconds < 60) {
    return `${seconds}s`;
  }
  const minutes = Math.floor(seconds / 60);
  const remainingSeconds = seconds % 60;
  return `${minutes}m ${remainingSeconds}s`;
}

export class ProgressTracker implements PhaseProgress {
  private spinner: Ora;
  private startTime: number;
  private phaseStartTime: number;
  private currentPhase: ProgressPhase | null = null;
  private detail: string = "";
  private updateInterval: NodeJS.Timeout | null = null;

  /**
   * In verbose mode child output is streamed to the terminal, so the
   * spinner only prints plain status lines instead of animating.
   */
  constructor(verbose: boolean = false) {
    this.spinner = ora({
      spinner: "dots",
      color: "cyan",
      isEnabled: verbose ? false : undefined,
    });
    this.startTime = Date.now();
    this.phaseStartTime = Date.now();
  }

  startPhase(phase: ProgressPhase, detail?: string): void {
    this.stopInterval();

    this.currentPhase = phase;
    this.phaseStartTime = Date.now();
    this.detail = detail || "";

    const label = PHASE_LABELS[phase];
    const icon = PHASE_ICONS[phase];
    const text = detail ? `${icon} ${label}: ${detail}` : `${icon} ${label}...`;

    this.spinner.start(text);

    // Builds and hardware tests can run for minutes
    if (phase !== "report") {
      this.updateInterval = setInterval(() => {
        this.updateSpinnerText();
      }, 1000);
    }
  }

  private updateSpinnerText(): void {
    if (!this.currentPhase) return;

    const elapsed = formatElapsed(Date.now() - this.phaseStartTime);
    let text = `${PHASE_ICONS[this.currentPhase]} ${PHASE_LABELS[this.currentPhase]}`;
    if (this.detail) {
      text += `: ${this.detail}`;
    }
    this.spinner.text = text + chalk.gray(` [${elapsed}]`);
  }

  private stopInterval(): void {
    if (this.updateInterval) {
      clearInterval(this.updateInterval);
      this.updateInterval = null;
    }
  }

  /**
   * Complete current phase successfully
   */
  succeed(message?: string): void {
    this.stopInterval();

    const elapsed = formatElapsed(Date.now() - this.phaseStartTime);
    const text = message || (this.currentPhase ? PHASE_LABELS[this.currentPhase] : "Done");

    this.spinner.succeed(text + chalk.gray(` [${elapsed}]`));
    this.currentPhase = null;
  }

  /**
   * Fail current phase
   */
  fail(message: string): void {
    this.stopInterval();

    const elapsed = formatElapsed(Date.now() - this.phaseStartTime);
    this.spinner.fail(message + chalk.gray(` [${elapsed}]`));
    this.currentPhase = null;
  }

  getCurrentPhase(): ProgressPhase | null {
    return this.currentPhase;
  }

  getElapsedTime(): number {
    return Date.now() - this.startTime;
  }

  stop(): void {
    this.stopInterval();
    this.spinner.stop();
    this.currentPhase = null;
  }
}
