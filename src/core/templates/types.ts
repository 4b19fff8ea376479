import type { InstallerConfig } from '../entities/InstallerConfig.js';

/**
 * A TOML value as it appears in an answer file
 */
export type AnswerValue = string | readonly string[];

/**
 * One [section] of an answer file, keys in output order
 */
export interface AnswerSection {
  name: string;
  entries: ReadonlyArray<readonly [key: string, value: AnswerValue]>;
}

export interface RenderOptions {
  /**
   * Adds a "# generated-at" header line. The only part of the output
   * that differs between two renders of the same config.
   */
  generatedAt?: Date;
}

/**
 * Interface for answer-file templates
 */
export interface AnswerFileTemplate {
  /**
   * Map a validated config onto ordered answer-file sections
   */
  buildSections(config: InstallerConfig): AnswerSection[];

  render(config: InstallerConfig, options?: RenderOptions): string;

  /**
   * Get the template name
   */
  getName(): string;
}
