export interface Chunk {
    text: string;
    whitespace: boolean;
}

const WHITESPACE_RUN = /(\s+)/;

/**
 * Splits text into alternating whitespace / non-whitespace runs. Empty runs
 * are dropped, so `chunks.map(c => c.text).join('') === text`.
 */
export function chunkText(text: string): Chunk[] {
    const chunks: Chunk[] = [];
    const parts = text.split(WHITESPACE_RUN);
    for (let i = 0; i < parts.length; i++) {
        const part = parts[i];
        if (!part) continue;
        // split() with a capture group puts the separators at odd indices
        chunks.push({ text: part, whitespace: i % 2 === 1 });
    }
    return chunks;
}
