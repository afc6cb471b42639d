/**
 * TemplateBuilder - Line-level helpers shared by the source templates
 *
 * Handles indentation, doc comments and literal escaping so templates only
 * decide what goes on each line.
 */

/**
 * Options for template generation
 */
export interface TemplateBuilderOptions {
  /** Whether to include doc comments */
  includeDocumentation?: boolean;
  /** Indentation string (default: 4 spaces) */
  indent?: string;
}

export class TemplateBuilder {
  private options: Required<TemplateBuilderOptions>;

  constructor(options: TemplateBuilderOptions = {}) {
    this.options = {
      includeDocumentation: true,
      indent: '    ',
      ...options,
    };
  }

  /**
   * Gets indentation string for a given level
   */
  getIndent(level: number): string {
    return this.options.indent.repeat(level);
  }

  /**
   * Indents all non-empty lines in a string by the specified level
   */
  indentLines(text: string, level: number): string {
    const indent = this.getIndent(level);
    return text.split('\n').map(line => line ? indent + line : line).join('\n');
  }

  /**
   * XML doc summary lines, or nothing when documentation is off or absent
   */
  summary(text: string | undefined, level: number): string[] {
    if (!this.options.includeDocumentation || !text || !text.trim()) {
      return [];
    }

    const indent = this.getIndent(level);
    const lines = text.trim().split(/\r?\n/).map(line => `${indent}/// ${escapeXml(line.trim())}`);
    return [`${indent}/// <summary>`, ...lines, `${indent}/// </summary>`];
  }
}

export function escapeXml(text: string): string {
  return text.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');
}

/**
 * Escapes text for a regular double-quoted string literal
 */
export function escapeStringLiteral(text: string): string {
  return text.replace(/\\/g, '\\\\').replace(/"/g, '\\"');
}
