import { describe, it, expect } from 'vitest';
import { ArtifactScanner } from '../../src/services/ArtifactScanner.js';

describe('ArtifactScanner', () => {
  const scanner = new ArtifactScanner();

  describe('scan', () => {
    it('should pass a plain read query', () => {
      expect(scanner.scan('SELECT * FROM sow_drops WHERE status = 1')).toEqual({
        flagged: false,
        reasons: [],
      });
    });

    it('should flag destructive statements', () => {
      expect(scanner.scan('DROP TABLE sow_drops').reasons).toEqual(['forbidden statement: DROP']);
      expect(scanner.scan('truncate projects').reasons).toEqual(['forbidden statement: TRUNCATE']);
    });

    it('should flag stacked statements', () => {
      const result = scanner.scan('SELECT 1; delete from staff');

      expect(result.flagged).toBe(true);
      expect(result.reasons).toEqual(['forbidden statement: DELETE', 'multiple statements (2)']);
    });

    it('should allow a single trailing semicolon', () => {
      expect(scanner.scan('SELECT 1;').flagged).toBe(false);
    });

    it('should ignore keywords inside string literals and comments', () => {
      expect(scanner.scan("SELECT 'drop' AS word FROM staff").flagged).toBe(false);
      expect(scanner.scan('SELECT 1 -- drop everything').flagged).toBe(false);
      expect(scanner.scan('SELECT /* update later */ name FROM staff').flagged).toBe(false);
    });

    it('should not match keywords inside identifiers', () => {
      expect(scanner.scan('SELECT updated_at, created_by FROM status_changes').flagged).toBe(false);
    });

    it('should not let a comment marker inside a literal hide a statement', () => {
      const result = scanner.scan("SELECT '--' || name FROM staff; DROP TABLE staff");

      expect(result.reasons).toEqual(['forbidden statement: DROP', 'multiple statements (2)']);
    });
  });
});
