import { LanguageCount } from '../../types/subtitles.js';

/**
 * Per-language tally of subtitles acquired during one run.
 * Map insertion order gives the summary its order of first increment.
 */
export class ResultAggregator {
  private readonly counts = new Map<string, number>();

  record(language: string): void {
    this.counts.set(language, (this.counts.get(language) ?? 0) + 1);
  }

  count(language: string): number {
    return this.counts.get(language) ?? 0;
  }

  summarize(): LanguageCount[] {
    return Array.from(this.counts, ([language, count]) => ({ language, count }));
  }

  /**
   * "heb - 2, eng - 1"
   */
  format(): string {
    return this.summarize()
      .map(({ language, count }) => `${language} - ${count}`)
      .join(', ');
  }
}
