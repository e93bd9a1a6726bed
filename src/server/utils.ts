import { Position, Range } from 'vscode-languageserver/node';

// Replace string literal contents (and the comment) with spaces to preserve positions
// Returns whether the line ends inside an unterminated (multi-line) string
export function blankLine(line: string, inString = false): { text: string; inString: boolean } {
    let result = '';
    let quoted = inString;
    for (let i = 0; i < line.length; i++) {
        const char = line[i];
        if (quoted) {
            if (char === '"') {
                if (i + 1 < line.length && line[i + 1] === '"') {
                    result += '  ';
                    i++;
                } else {
                    result += char;
                    quoted = false;
                }
            } else {
                result += ' ';
            }
        } else if (char === '/' && line[i + 1] === '/') {
            result += ' '.repeat(line.length - i);
            break;
        } else {
            result += char;
            if (char === '"') {
                quoted = true;
            }
        }
    }
    return { text: result, inString: quoted };
}

// BSL names are case-insensitive; fold with the locale-independent mapping
export function foldName(name: string): string {
    return name.toLowerCase();
}

export function comparePositions(a: Position, b: Position): number {
    if (a.line !== b.line) return a.line - b.line;
    return a.character - b.character;
}

// Ranges are half-open: start is inside, end is not
export function containsPosition(range: Range, position: Position): boolean {
    return comparePositions(range.start, position) <= 0 && comparePositions(position, range.end) < 0;
}

export function rangeKey(range: Range): string {
    return `${range.start.line}:${range.start.character}-${range.end.line}:${range.end.character}`;
}

// Ranges handed out by the index are copies; callers may change them freely
export function copyRange(range: Range): Range {
    return Range.create(range.start.line, range.start.character, range.end.line, range.end.character);
}

export function rangesEqual(a: Range, b: Range): boolean {
    return rangeKey(a) === rangeKey(b);
}
