export const ONSET_ANALYZER = Symbol('ONSET_ANALYZER');

export interface OnsetEvent {
  time: number;
  confidence: number;
}

export interface AnalysisWindow {
  startSec: number;
  endSec: number;
}

export interface OnsetAnalyzeOptions {
  threshold: number;
  /** Restrict detection to this span; returned times stay absolute. */
  window?: AnalysisWindow;
}

export interface OnsetAnalysis {
  /** Length of the analysed span in seconds. */
  durationSec: number;
  onsets: OnsetEvent[];
}

export interface IOnsetAnalyzer {
  analyze(audioPath: string, options: OnsetAnalyzeOptions): Promise<OnsetAnalysis>;
}
