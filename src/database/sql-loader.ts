/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import fs from 'node:fs';
import path from 'node:path';

const NAME_LINE = /^--\s*([A-Za-z][A-Za-z0-9_]*)\s*$/;

// Drops a trailing `--` comment unless it sits inside a quoted string
function stripLineComment(line: string): string {
  let quote: string | undefined;
  for (let i = 0; i < line.length; i++) {
    const char = line[i];
    if (quote !== undefined) {
      if (char === quote) {
        quote = undefined;
      }
    } else if (char === "'" || char === '"') {
      quote = char;
    } else if (char === '-' && line[i + 1] === '-') {
      return line.slice(0, i).trimEnd();
    }
  }
  return line.trimEnd();
}

/**
 * Splits SQL file content into named statements. A statement starts with a
 * `-- name` line at the start of the file or after a blank line; other
 * comments are removed from the statement body.
 *
 * @example
 * parseSqlStatements('-- selectOne\nSELECT 1;')
 * // Returns: { selectOne: 'SELECT 1;' }
 */
export function parseSqlStatements(content: string): Record<string, string> {
  const statements: Record<string, string> = {};
  const lines = content.replace(/\r\n/g, '\n').split('\n');

  let name: string | undefined;
  let body: string[] = [];

  const flush = () => {
    if (name !== undefined) {
      statements[name] = body.join('\n').trim();
    }
    body = [];
  };

  lines.forEach((line, i) => {
    const match = line.trim().match(NAME_LINE);
    const startsStatement = i === 0 || lines[i - 1].trim() === '';
    if (match !== null && startsStatement) {
      flush();
      name = match[1];
      return;
    }

    const cleaned = stripLineComment(line);
    if (name !== undefined && (cleaned !== '' || line.trim() === '')) {
      body.push(cleaned);
    }
  });
  flush();

  return statements;
}

// Named statements from every .sql file in a directory, in file name order
export default function loadSql(dir: string): Record<string, string> {
  return fs
    .readdirSync(dir)
    .filter((file) => file.endsWith('.sql'))
    .sort()
    .reduce<Record<string, string>>(
      (statements, file) =>
        Object.assign(
          statements,
          parseSqlStatements(fs.readFileSync(path.resolve(dir, file), 'utf8')),
        ),
      {},
    );
}
