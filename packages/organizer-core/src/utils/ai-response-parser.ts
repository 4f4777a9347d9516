/**
 * AI Response Parser
 *
 * Pulls a JSON document out of free-form model output. Models wrap JSON in
 * markdown fences, prefix it with prose, or append commentary; all of those
 * are accepted.
 */

/**
 * Configuration for bracket matching operations
 */
interface BracketConfig {
    open: string;
    close: string;
}

const OBJECT_BRACKET_CONFIG: BracketConfig = { open: '{', close: '}' };
const ARRAY_BRACKET_CONFIG: BracketConfig = { open: '[', close: ']' };

/**
 * Find all top-level bracket pairs
 */
function findAllBracketPositions(str: string, config: BracketConfig): Array<{ start: number; end: number }> {
    const positions: Array<{ start: number; end: number }> = [];
    let depth = 0;
    let start = -1;

    for (let i = 0; i < str.length; i++) {
        if (str[i] === config.open) {
            if (depth === 0) start = i;
            depth++;
        } else if (str[i] === config.close && depth > 0) {
            depth--;
            if (depth === 0 && start !== -1) {
                positions.push({ start, end: i });
                start = -1;
            }
        }
    }
    return positions;
}

function isParseable(candidate: string): boolean {
    try {
        JSON.parse(candidate);
        return true;
    } catch {
        return false;
    }
}

/**
 * Try the widest span first, then each top-level pair from the last back.
 */
function tryExtractStructure(text: string, config: BracketConfig): string | null {
    const first = text.indexOf(config.open);
    const last = text.lastIndexOf(config.close);
    if (first === -1 || last <= first) {
        return null;
    }

    const widest = text.substring(first, last + 1);
    if (isParseable(widest)) {
        return widest;
    }

    const positions = findAllBracketPositions(text, config);
    for (let i = positions.length - 1; i >= 0; i--) {
        const { start, end } = positions[i];
        const candidate = text.substring(start, end + 1);
        if (isParseable(candidate)) {
            return candidate;
        }
    }
    return null;
}

/**
 * Extract JSON from a response string
 * @returns Extracted JSON text, or null if none parses
 */
export function extractJSON(response: string): string | null {
    if (!response) {
        return null;
    }

    const trimmed = response.trim();

    const codeBlockPatterns = [
        /```json\s*([\s\S]*?)```/,
        /```\s*([\s\S]*?)```/,
    ];

    for (const pattern of codeBlockPatterns) {
        const match = trimmed.match(pattern);
        if (match) {
            const extracted = match[1].trim();
            if ((extracted.startsWith('{') || extracted.startsWith('[')) && isParseable(extracted)) {
                return extracted;
            }
        }
    }

    const firstBrace = trimmed.indexOf('{');
    const firstBracket = trimmed.indexOf('[');

    // Whichever structure opens first is the top-level one
    if (firstBracket !== -1 && (firstBrace === -1 || firstBracket < firstBrace)) {
        return tryExtractStructure(trimmed, ARRAY_BRACKET_CONFIG)
            ?? tryExtractStructure(trimmed, OBJECT_BRACKET_CONFIG);
    }
    if (firstBrace !== -1) {
        return tryExtractStructure(trimmed, OBJECT_BRACKET_CONFIG)
            ?? tryExtractStructure(trimmed, ARRAY_BRACKET_CONFIG);
    }
    return null;
}

/**
 * Extract and parse a JSON object from an AI response.
 * @throws Error when no JSON object can be found
 */
export function parseJSONObject(response: string): Record<string, unknown> {
    const json = extractJSON(response);
    if (!json) {
        throw new Error('No JSON found in AI response');
    }

    const parsed: unknown = JSON.parse(json);
    if (Array.isArray(parsed) && parsed.length === 1 && isPlainObject(parsed[0])) {
        return parsed[0];
    }
    if (!isPlainObject(parsed)) {
        throw new Error('AI response JSON is not an object');
    }
    return parsed;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}
