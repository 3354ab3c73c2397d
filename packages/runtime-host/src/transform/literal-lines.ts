/**
 * nbimport Runtime Host — Literal Line Detection
 *
 * Line magics are recognised line by line, but a line that starts inside a
 * template literal or a block comment is text, not code:
 *
 *   msg = `progress:
 *   %done                  ← part of the template, left alone
 *   `
 *
 * linesInsideLiterals() scans the cell once with the TypeScript scanner and
 * reports, per line, whether the line begins inside a multi-line token: a
 * template literal or block comment, or a string continued with a trailing
 * backslash.
 *
 * Lines that `isMagic` accepts at code level are skipped by the scan, so
 * quotes or backticks in magic arguments open nothing. A `/` is read as the
 * start of a regular expression when the previous token cannot end an
 * expression, which is the usual heuristic and is wrong only after a block
 * `}` or a control-statement `)`.
 */

import ts from 'typescript';

export function linesInsideLiterals(source: string, isMagic: (line: string) => boolean): boolean[] {
  const lines = source.split('\n');
  const lineStarts: number[] = [];
  const lineAt = new Map<number, number>();
  let offset = 0;
  for (const [index, line] of lines.entries()) {
    lineStarts.push(offset);
    lineAt.set(offset, index);
    offset += line.length + 1;
  }

  const inside = lines.map(() => false);
  const mark = (start: number, end: number): void => {
    for (const [index, lineStart] of lineStarts.entries()) {
      if (lineStart >= end) {
        break;
      }
      if (lineStart > start) {
        inside[index] = true;
      }
    }
  };

  const scanner = ts.createScanner(
    ts.ScriptTarget.Latest,
    /* skipTrivia */ false,
    ts.LanguageVariant.Standard,
    source,
  );

  // Resume after the line starting at `pos` if it is a magic line.
  const skipMagicLine = (pos: number): boolean => {
    const index = lineAt.get(pos);
    const line = index === undefined ? undefined : lines[index];
    if (line === undefined || !isMagic(line)) {
      return false;
    }
    scanner.setText(source, pos + line.length);
    return true;
  };

  // Open-brace depth inside each template substitution being scanned.
  const templates: number[] = [];
  let previous: ts.SyntaxKind = skipMagicLine(0) ? ts.SyntaxKind.SemicolonToken : ts.SyntaxKind.Unknown;

  for (let kind = scanner.scan(); kind !== ts.SyntaxKind.EndOfFileToken; kind = scanner.scan()) {
    switch (kind) {
      case ts.SyntaxKind.NewLineTrivia:
        if (skipMagicLine(scanner.getTokenEnd())) {
          previous = ts.SyntaxKind.SemicolonToken;
        }
        continue;
      case ts.SyntaxKind.WhitespaceTrivia:
      case ts.SyntaxKind.SingleLineCommentTrivia:
      case ts.SyntaxKind.ShebangTrivia:
      case ts.SyntaxKind.ConflictMarkerTrivia:
        continue;
      case ts.SyntaxKind.MultiLineCommentTrivia:
        mark(scanner.getTokenStart(), scanner.getTokenEnd());
        continue;
      case ts.SyntaxKind.StringLiteral:
      case ts.SyntaxKind.NoSubstitutionTemplateLiteral:
        mark(scanner.getTokenStart(), scanner.getTokenEnd());
        break;
      case ts.SyntaxKind.TemplateHead:
        mark(scanner.getTokenStart(), scanner.getTokenEnd());
        templates.push(0);
        break;
      case ts.SyntaxKind.OpenBraceToken: {
        const depth = templates.pop();
        if (depth !== undefined) {
          templates.push(depth + 1);
        }
        break;
      }
      case ts.SyntaxKind.CloseBraceToken: {
        const depth = templates.pop();
        if (depth === undefined) {
          break;
        }
        if (depth > 0) {
          templates.push(depth - 1);
          break;
        }
        kind = scanner.reScanTemplateToken(/* isTaggedTemplate */ false);
        mark(scanner.getTokenStart(), scanner.getTokenEnd());
        if (kind === ts.SyntaxKind.TemplateMiddle) {
          templates.push(0);
        }
        break;
      }
      case ts.SyntaxKind.SlashToken:
      case ts.SyntaxKind.SlashEqualsToken:
        if (!endsExpression(previous)) {
          kind = scanner.reScanSlashToken();
        }
        break;
      default:
        break;
    }
    previous = kind;
  }

  return inside;
}

function endsExpression(kind: ts.SyntaxKind): boolean {
  switch (kind) {
    case ts.SyntaxKind.Identifier:
    case ts.SyntaxKind.PrivateIdentifier:
    case ts.SyntaxKind.ThisKeyword:
    case ts.SyntaxKind.SuperKeyword:
    case ts.SyntaxKind.NullKeyword:
    case ts.SyntaxKind.TrueKeyword:
    case ts.SyntaxKind.FalseKeyword:
    case ts.SyntaxKind.NumericLiteral:
    case ts.SyntaxKind.BigIntLiteral:
    case ts.SyntaxKind.StringLiteral:
    case ts.SyntaxKind.RegularExpressionLiteral:
    case ts.SyntaxKind.NoSubstitutionTemplateLiteral:
    case ts.SyntaxKind.TemplateTail:
    case ts.SyntaxKind.CloseParenToken:
    case ts.SyntaxKind.CloseBracketToken:
    case ts.SyntaxKind.CloseBraceToken:
    case ts.SyntaxKind.PlusPlusToken:
    case ts.SyntaxKind.MinusMinusToken:
      return true;
    default:
      return kind >= ts.SyntaxKind.AbstractKeyword && kind <= ts.SyntaxKind.LastKeyword;
  }
}
