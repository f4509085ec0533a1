/**
 * Line assembly utilities for Moonlet
 *
 * Raw source lines are merged into logical lines: one complete top-level
 * statement each, with any nested block folded onto a single line.
 */

const BLOCK_OPENERS = ['if ', 'for ', 'while ', 'function ', 'local function'] as const;

const COMMENT_MARKER = '--';

/**
 * Split script text into raw lines
 */
export function splitSourceLines(script: string): string[] {
    return script.split(/\r?\n/);
}

/**
 * Normalize single quotes to double quotes and cut the line at the first
 * comment marker. The scan is textual: quotes and markers inside string
 * literals are not protected.
 */
export function stripComment(line: string): string {
    const normalized = line.replace(/'/g, '"');
    const commentIndex = normalized.indexOf(COMMENT_MARKER);
    return commentIndex >= 0 ? normalized.slice(0, commentIndex) : normalized;
}

/**
 * Whether a trimmed line starts a block that runs to a matching `end`
 */
export function opensBlock(trimmedLine: string): boolean {
    return BLOCK_OPENERS.some((opener) => trimmedLine.startsWith(opener));
}

function closesBlock(trimmedLine: string): boolean {
    return trimmedLine.toLowerCase() === 'end';
}

/**
 * Merge raw lines into logical lines by tracking block nesting depth.
 *
 * Blank and comment-only lines are dropped. A block is flushed, joined by
 * single spaces, when its depth returns to zero; an unterminated block is
 * flushed at the end of input.
 */
export function splitIntoLogicalLines(lines: readonly string[]): string[] {
    const logicalLines: string[] = [];
    let block: string[] = [];
    let depth = 0;

    for (const rawLine of lines) {
        const trimmed = stripComment(rawLine).trim();
        if (trimmed === '') {
            continue;
        }

        if (depth === 0) {
            if (opensBlock(trimmed)) {
                depth = 1;
                block.push(trimmed);
            } else {
                logicalLines.push(trimmed);
            }
            continue;
        }

        if (opensBlock(trimmed)) {
            depth++;
        }
        block.push(trimmed);

        if (closesBlock(trimmed)) {
            depth--;
            if (depth === 0) {
                logicalLines.push(block.join(' ').trim());
                block = [];
            }
        }
    }

    if (block.length > 0) {
        logicalLines.push(block.join(' ').trim());
    }

    return logicalLines;
}
