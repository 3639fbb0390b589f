/**
 * Artifact scanner for data-modifying or stacked statements.
 *
 * Generated artifacts are read queries. Anything that could change data or
 * schema, or that chains several statements, is flagged and the tier that
 * produced it is treated as failed.
 */

export interface ScanResult {
  flagged: boolean;
  reasons: string[];
}

const DESTRUCTIVE_KEYWORDS = [
  'DROP',
  'DELETE',
  'TRUNCATE',
  'ALTER',
  'CREATE',
  'INSERT',
  'UPDATE',
  'GRANT',
  'REVOKE',
];

export class ArtifactScanner {
  private readonly keywordPatterns = DESTRUCTIVE_KEYWORDS.map((keyword) => ({
    pattern: new RegExp(`\\b${keyword}\\b`, 'i'),
    label: `forbidden statement: ${keyword}`,
  }));

  scan(artifact: string): ScanResult {
    const reasons: string[] = [];
    const code = stripLiteralsAndComments(artifact);

    for (const { pattern, label } of this.keywordPatterns) {
      if (pattern.test(code)) {
        reasons.push(label);
      }
    }

    const statements = code.split(';').filter((s) => s.trim().length > 0);
    if (statements.length > 1) {
      reasons.push(`multiple statements (${statements.length})`);
    }

    return {
      flagged: reasons.length > 0,
      reasons,
    };
  }
}

/** Blank out comments and quoted text so keywords inside them don't count. */
function stripLiteralsAndComments(text: string): string {
  return text.replace(
    /\/\*[\s\S]*?\*\/|--[^\n]*|'(?:[^']|'')*'|"(?:[^"]|"")*"/g,
    (match) => (match.startsWith("'") || match.startsWith('"') ? "''" : ' ')
  );
}
