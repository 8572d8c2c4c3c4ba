import { PipelineLogger } from './LoggerUtils.js';

const CODE_FENCE = /```(?:json)?\s*([\s\S]*?)```/;

export class JsonUtils {

  /**
   * Returns the body of the first fenced block, or the trimmed text when there is none.
   */
  static stripCodeFences(response: string): string {
    const match = response.match(CODE_FENCE);
    return (match ? match[1] : response).trim();
  }

  /**
   * Parse model output that is supposed to be JSON.
   * Tries the text as-is, then with trailing commas removed, then the outermost
   * array or object slice. Returns undefined when nothing parses.
   */
  static parseLenient(response: string): unknown {
    const cleaned = this.stripCodeFences(response);
    if (cleaned === '') return undefined;

    const direct = this.tryParse(cleaned);
    if (direct.ok) return direct.value;

    PipelineLogger.debug('JSON UTILS', 'Initial parse failed, attempting cleanup...');
    const withoutTrailingCommas = cleaned.replace(/,(\s*[}\]])/g, '$1');
    const repaired = this.tryParse(withoutTrailingCommas);
    if (repaired.ok) return repaired.value;

    for (const [open, close] of [['[', ']'], ['{', '}']]) {
      const start = withoutTrailingCommas.indexOf(open);
      const end = withoutTrailingCommas.lastIndexOf(close);
      if (start !== -1 && end > start) {
        const sliced = this.tryParse(withoutTrailingCommas.slice(start, end + 1));
        if (sliced.ok) return sliced.value;
      }
    }

    PipelineLogger.debug('JSON UTILS', 'Cleanup parse also failed');
    return undefined;
  }

  private static tryParse(text: string): { ok: true; value: unknown } | { ok: false } {
    try {
      const value: unknown = JSON.parse(text);
      return { ok: true, value };
    } catch {
      return { ok: false };
    }
  }
}
