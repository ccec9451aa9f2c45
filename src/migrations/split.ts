const TRIGGER_START = /^CREATE\s+(?:TEMP\s+|TEMPORARY\s+)?TRIGGER\b/i;
// BEGIN, CASE and END as bare keywords; `new.end` and `end_at` are not.
const BLOCK_KEYWORD = /(?<![\w.$])(BEGIN|CASE|END)(?![\w$])/gi;

/**
 * True once every BEGIN and CASE in the trigger text has met its END.
 * Expects quoted text to be blanked out already.
 */
function isTriggerComplete(statement: string): boolean {
  let depth = 0;
  let opened = false;
  for (const [, keyword] of statement.matchAll(BLOCK_KEYWORD)) {
    if (keyword.toUpperCase() === 'END') {
      depth--;
    } else {
      depth++;
      if (keyword.toUpperCase() === 'BEGIN') opened = true;
    }
  }
  return opened && depth <= 0;
}

/**
 * Splits a SQLite script into single statements on top-level semicolons.
 * Quoted strings and identifiers, comments and trigger bodies are kept
 * intact; chunks holding only comments are dropped.
 */
export function splitSqlStatements(sql: string): string[] {
  const statements: string[] = [];
  let current = '';
  let code = '';
  // `code` with quoted text left out, for keyword matching
  let bare = '';
  let closing: string | null = null;
  let inLineComment = false;
  let inBlockComment = false;

  const flush = () => {
    if (code.trim()) {
      statements.push(current.trim());
    }
    current = '';
    code = '';
    bare = '';
  };

  for (let i = 0; i < sql.length; i++) {
    const char = sql.charAt(i);
    const next = sql.charAt(i + 1);

    if (inLineComment) {
      current += char;
      if (char === '\n') inLineComment = false;
      continue;
    }

    if (inBlockComment) {
      current += char;
      if (char === '*' && next === '/') {
        current += next;
        i++;
        inBlockComment = false;
      }
      continue;
    }

    if (closing !== null) {
      current += char;
      code += char;
      if (char === closing) {
        if (next === closing && closing !== ']') {
          // doubled quote is an escaped quote
          current += next;
          code += next;
          i++;
        } else {
          closing = null;
        }
      }
      continue;
    }

    if (char === '-' && next === '-') {
      inLineComment = true;
      current += char;
      continue;
    }

    if (char === '/' && next === '*') {
      inBlockComment = true;
      current += char;
      continue;
    }

    if (char === "'" || char === '"' || char === '`' || char === '[') {
      closing = char === '[' ? ']' : char;
      current += char;
      code += char;
      bare += ' ';
      continue;
    }

    if (char === ';') {
      const statement = bare.trim();
      if (TRIGGER_START.test(statement) && !isTriggerComplete(statement)) {
        current += char;
        code += char;
        bare += char;
        continue;
      }
      flush();
      continue;
    }

    current += char;
    code += char;
    bare += char;
  }

  flush();
  return statements;
}
