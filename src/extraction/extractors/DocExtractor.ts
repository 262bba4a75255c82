/**
 * Legacy Word (.doc) extractor using antiword.
 *
 * @module extraction/extractors/DocExtractor
 */

import { ShellRunner } from "../shell/ShellRunner.js";
import type { CommandRunner, ExtractorConfig, RawContent } from "../types.js";
import { BaseExtractor } from "./BaseExtractor.js";

/**
 * DOC-specific extractor configuration.
 */
export interface DocExtractorConfig extends ExtractorConfig {
  /**
   * @default new ShellRunner()
   */
  runner?: CommandRunner;
}

export class DocExtractor extends BaseExtractor {
  readonly documentType = "doc";
  override readonly methods = ["antiword"] as const;

  private readonly runner: CommandRunner;

  constructor(config?: DocExtractorConfig) {
    super(config);
    this.runner = config?.runner ?? new ShellRunner();
  }

  protected async extractFrom(filePath: string): Promise<RawContent> {
    const { stdout } = await this.runner.run(["antiword", filePath]);
    return stdout;
  }
}
