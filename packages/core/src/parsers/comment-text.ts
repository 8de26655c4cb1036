/**
 * Comment Text
 *
 * Groups raw Go comments the way the Go toolchain does, picks the lead
 * (doc) comment of a token, and turns a comment group into plain text.
 * Shared by the tree-sitter and fallback parsers so both attach docs
 * identically.
 */

/** A single `//` or `/* *\/` comment with its line span (1-based) */
export interface GoComment {
  text: string;
  line: number;
  endLine: number;
}

/**
 * Consume one comment group starting at `start`.
 *
 * A comment joins the group while it starts no more than `maxGap` lines after
 * the end of the previous one; `maxGap` 0 keeps to one line, 1 joins adjacent
 * lines.
 */
function consumeGroup(
  comments: readonly GoComment[],
  start: number,
  maxGap: number
): { group: GoComment[]; next: number; endLine: number } {
  const group: GoComment[] = [];
  let endLine = comments[start]?.line ?? 0;
  let index = start;

  for (let comment = comments[index]; comment && comment.line <= endLine + maxGap; comment = comments[index]) {
    group.push(comment);
    endLine = comment.endLine;
    index++;
  }

  return { group, next: index, endLine };
}

/**
 * Find the lead comment group of a token.
 *
 * @param comments - Comments between the previous token and this one, in order
 * @param prevLine - Line of the previous token, or null at start of file
 * @param tokenLine - Line of the token being documented
 * @returns The comment group ending on the line directly above the token
 */
export function findLeadComment(
  comments: readonly GoComment[],
  prevLine: number | null,
  tokenLine: number
): GoComment[] | null {
  let index = 0;

  // Comments on the previous token's line trail that token
  const first = comments[0];
  if (first && prevLine !== null && first.line === prevLine) {
    index = consumeGroup(comments, 0, 0).next;
  }

  let lead: GoComment[] | null = null;
  while (index < comments.length) {
    const { group, next, endLine } = consumeGroup(comments, index, 1);
    lead = endLine + 1 === tokenLine ? group : null;
    index = next;
  }

  return lead;
}

/**
 * Whether a `//` comment body is a tool directive such as `go:generate`
 */
function isDirective(body: string): boolean {
  if (/^(line|extern|export) /.test(body)) {
    return true;
  }
  return /^[a-z0-9]+:[a-z0-9]/.test(body);
}

/**
 * Plain text of a comment group.
 *
 * Carriage returns go first. Markers are removed along with one space after
 * `//`, directive lines are dropped, trailing whitespace is trimmed per line,
 * leading blank lines are dropped and interior runs of blank lines collapse
 * to one. Non-empty results end with a newline.
 */
export function commentGroupText(group: readonly GoComment[]): string {
  const lines: string[] = [];

  for (const comment of group) {
    let body = comment.text.replace(/\r/g, '');

    if (body.startsWith('//')) {
      body = body.slice(2);
      if (body.startsWith(' ')) {
        body = body.slice(1);
      } else if (body.length > 0 && isDirective(body)) {
        continue;
      }
    } else if (body.startsWith('/*')) {
      body = body.slice(2, body.endsWith('*/') ? -2 : undefined);
    }

    for (const line of body.split('\n')) {
      lines.push(line.replace(/[ \t\r\n]+$/, ''));
    }
  }

  const kept: string[] = [];
  for (const line of lines) {
    const previous = kept[kept.length - 1];
    if (line !== '' || (previous !== undefined && previous !== '')) {
      kept.push(line);
    }
  }

  if (kept.length > 0 && kept[kept.length - 1] !== '') {
    kept.push('');
  }

  return kept.join('\n');
}

/**
 * Doc text of a token, or null when it has no lead comment or the comment
 * has no text.
 */
export function leadCommentText(
  comments: readonly GoComment[],
  prevLine: number | null,
  tokenLine: number
): string | null {
  const lead = findLeadComment(comments, prevLine, tokenLine);
  if (!lead) {
    return null;
  }
  const text = commentGroupText(lead);
  return text === '' ? null : text;
}
