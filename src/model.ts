import * as fs from 'fs';
import * as path from 'path';
import { performance } from 'perf_hooks';
import { z } from 'zod';
import { DEFAULT_TOP_N, LANGUAGE_FILES, isBuiltinLanguage, type Language } from './constants';
import { Dictionary, buildWordList, loadWordList, type CostModelOptions } from './dictionary';
import { Segmenter } from './segmenter';
import { BeamSearch, type Candidate } from './beam';
import { rejoinTokens, spacingRulesFor, type SpacingRules } from './rejoiner';
import { ConfigurationError } from './errors';
import { loadConfig, type Config } from './config';
import { createLogger } from './logger';

const log = createLogger('model');

export interface ModelOptions extends CostModelOptions {
    /** Dictionary artifact. Required for `custom`; replaces the built-in file otherwise. */
    wordFile?: string;
    /** Directory of the built-in artifacts, overriding WORDSPLIT_RESOURCES_DIR. */
    resourcesDir?: string;
}

const ModelOptionsSchema = z
    .object({
        addWords: z.array(z.string()).optional(),
        blacklist: z.array(z.string()).optional(),
        addToTop: z.boolean().optional(),
        overwrite: z.boolean().optional(),
        wordFile: z.string().min(1).optional(),
        resourcesDir: z.string().min(1).optional(),
    })
    .strict();

function parseOptions(options: unknown): ModelOptions {
    const parsed = ModelOptionsSchema.safeParse(options);
    if (!parsed.success) {
        const issues = parsed.error.issues.map((issue) => {
            const where = issue.path.join('.');
            return where ? `${where}: ${issue.message}` : issue.message;
        });
        throw new ConfigurationError(`Invalid model options: ${issues.join('; ')}`);
    }
    return parsed.data;
}

function resolveArtifact(language: string, options: ModelOptions, config: Config): { language: Language; wordFile: string } {
    if (language === 'custom') {
        if (!options.wordFile || !fs.existsSync(options.wordFile)) {
            throw new ConfigurationError("If language is 'custom', a valid 'wordFile' path must be provided.");
        }
        return { language, wordFile: options.wordFile };
    }

    if (!isBuiltinLanguage(language)) {
        throw new ConfigurationError(`Language '${language}' not supported. Use 'custom' and provide a wordFile.`);
    }

    const resourcesDir = options.resourcesDir ?? config.resourcesDir;
    return { language, wordFile: options.wordFile ?? path.join(resourcesDir, LANGUAGE_FILES[language]) };
}

/**
 * Splits, ranks and rejoins text using word frequencies for one language.
 * Immutable once built; safe to share between callers.
 */
export class LanguageModel {
    readonly language: Language;
    readonly spacing: SpacingRules;
    private readonly dictionary: Dictionary;
    private readonly segmenter: Segmenter;
    private readonly beam: BeamSearch;

    private constructor(language: Language, dictionary: Dictionary) {
        this.language = language;
        this.dictionary = dictionary;
        this.spacing = spacingRulesFor(language);
        this.segmenter = new Segmenter(dictionary);
        this.beam = new BeamSearch(dictionary);
    }

    /**
     * Loads a built-in language ('en', 'de', 'fr', 'es', 'it', 'pt') or, with
     * `language: 'custom'`, the artifact at `options.wordFile`.
     */
    static async create(language: string = 'en', options: ModelOptions = {}): Promise<LanguageModel> {
        // Environment is validated up front, whether or not anything is logged
        const config = loadConfig();
        const opts = parseOptions(options);
        const resolved = resolveArtifact(language, opts, config);

        const start = performance.now();
        const words = await loadWordList(resolved.wordFile);
        const ranked = buildWordList(words, opts, resolved.wordFile);
        const dictionary = Dictionary.fromRankedWords(ranked, resolved.wordFile);

        const elapsed = performance.now() - start;
        log.info(
            `loaded '${resolved.language}' from ${resolved.wordFile}: ` +
            `${dictionary.size} words, max length ${dictionary.maxWordLength}, ${elapsed.toFixed(1)}ms`
        );
        return new LanguageModel(resolved.language, dictionary);
    }

    /** Builds a model from an in-memory ranked list, most frequent word first. */
    static fromWords(words: readonly string[], options: CostModelOptions = {}, language: Language = 'custom'): LanguageModel {
        // Validates the environment, as create() does
        loadConfig();
        const opts = parseOptions(options);
        if (opts.wordFile || opts.resourcesDir) {
            throw new ConfigurationError('fromWords() does not read artifacts; use create() with wordFile');
        }
        const ranked = buildWordList(words, opts);
        return new LanguageModel(language, Dictionary.fromRankedWords(ranked));
    }

    get size(): number {
        return this.dictionary.size;
    }

    get maxWordLength(): number {
        return this.dictionary.maxWordLength;
    }

    /** Cost of a dictionary word (case-insensitive), or undefined when unknown. */
    wordCost(word: string): number | undefined {
        return this.dictionary.getWordCost(word.toLowerCase());
    }

    /** Best split, preserving the input's case and whitespace. */
    split(text: string): string[] {
        return this.segmenter.segment(text);
    }

    /** Up to `topN` lowercased splits, cheapest first. */
    candidates(text: string, topN: number = DEFAULT_TOP_N): string[][] {
        return this.scoredCandidates(text, topN).map((cand) => cand.tokens);
    }

    scoredCandidates(text: string, topN: number = DEFAULT_TOP_N): Candidate[] {
        if (!Number.isInteger(topN) || topN < 0) {
            throw new RangeError(`topN must be a non-negative integer, got ${topN}`);
        }
        return this.beam.search(text, topN);
    }

    /** Splits `text` and joins the tokens back with this language's spacing rules. */
    rejoin(text: string): string {
        return rejoinTokens(this.split(text), this.spacing);
    }
}
