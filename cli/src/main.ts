#!/usr/bin/env node
import * as dotenv from 'dotenv';
import { createInterface } from 'node:readline';
import {
    createGame,
    DailyWordSource,
    loadWordList,
    RandomWordSource,
    type WordSource,
} from '@termle/engine';
import { loadConfig, type Config } from './config.js';
import { createLogger, type Logger } from './logger.js';
import { renderPlaceholder, renderWelcome } from './render.js';
import { runGame } from './loop.js';

dotenv.config();

const EXIT_WON = 0;
const EXIT_LOST = 1;
const EXIT_SETUP_FAILED = 2;

function createWordSource(config: Config, logger: Logger): WordSource {
    const words = config.wordsFile ? loadWordList(config.wordsFile) : loadWordList();
    logger.debug(`loaded ${words.length} words from ${config.wordsFile ?? 'the bundled list'}`);
    return config.daily ? new DailyWordSource(words) : new RandomWordSource(words);
}

async function main(): Promise<number> {
    let config: Config;
    try {
        config = loadConfig();
    } catch (error) {
        createLogger({ debug: false }).error('Invalid configuration', error);
        return EXIT_SETUP_FAILED;
    }

    const logger = createLogger({ debug: config.debug });

    let source: WordSource;
    try {
        source = createWordSource(config, logger);
    } catch (error) {
        logger.error('Could not load the word list', error);
        return EXIT_SETUP_FAILED;
    }

    const state = createGame({ secret: source.next(), maxAttempts: config.maxAttempts, scoring: config.scoring });
    logger.debug(`game started: ${config.maxAttempts} attempts, ${config.scoring} scoring${config.daily ? ', daily word' : ''}`);

    console.log(renderWelcome());
    console.log(renderPlaceholder());

    const rl = createInterface({ input: process.stdin, terminal: false });
    try {
        const final = await runGame({ state, input: rl, write: (line) => console.log(line), logger });
        return final.status === 'won' ? EXIT_WON : EXIT_LOST;
    } finally {
        rl.close();
    }
}

main()
    .then((code) => {
        process.exitCode = code;
    })
    .catch((error: unknown) => {
        createLogger({ debug: false }).error('Unexpected failure', error);
        process.exitCode = EXIT_SETUP_FAILED;
    });
