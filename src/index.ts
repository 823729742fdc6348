import { LanguageModel } from './model';

export const VERSION = '1.0.0';

export { LanguageModel, type ModelOptions } from './model';
export { Dictionary, buildWordList, loadWordList, type CostModelOptions } from './dictionary';
export { Segmenter } from './segmenter';
export { BeamSearch, type Candidate } from './beam';
export { rejoinTokens, spacingRulesFor, type SpacingRules } from './rejoiner';
export { chunkText, type Chunk } from './chunker';
export { mergeFragments } from './heuristics';
export { ConfigurationError, ArtifactError } from './errors';
export { loadConfig, type Config, type LogLevel } from './config';
export {
    LANGUAGE_FILES, UNKNOWN_CHAR_COST, UNREACHABLE_COST,
    type BuiltinLanguage, type Language
} from './constants';

let defaultModel: Promise<LanguageModel> | null = null;

/** English model, loaded on first use and shared afterwards. */
export function getDefaultModel(): Promise<LanguageModel> {
    if (!defaultModel) {
        // A failed load is not cached; the next call retries
        defaultModel = LanguageModel.create('en').catch((err: unknown) => {
            defaultModel = null;
            throw err;
        });
    }
    return defaultModel;
}

export function resetDefaultModel(): void {
    defaultModel = null;
}

/** Splits a string using the default English model. */
export async function split(text: string): Promise<string[]> {
    return (await getDefaultModel()).split(text);
}

/** Finds candidates for a string using the default English model. */
export async function candidates(text: string, topN?: number): Promise<string[][]> {
    return (await getDefaultModel()).candidates(text, topN);
}

/** Rejoins a string using the default English model's spacing rules. */
export async function rejoin(text: string): Promise<string> {
    return (await getDefaultModel()).rejoin(text);
}
