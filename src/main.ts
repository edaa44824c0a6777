/**
 * Command entry point: renders `mindmap.yaml` in the current directory
 * to `mindmap_output.png` and `mindmap_output.svg`.
 */
import { resolveMindmapConfig } from './config/mindmapConfig';
import { errorMessage } from './errors';
import { createLogger } from './logging/logger';
import { runMindmap } from './pipeline';

async function main(): Promise<void> {
    let logger = createLogger();

    try {
        const config = resolveMindmapConfig();
        logger = createLogger(config.logLevel);
        await runMindmap(config, { logger });
    } catch (error) {
        const errorName = error instanceof Error ? error.name : 'Error';
        logger.error({ err: error, errorName }, errorMessage(error));
        process.exitCode = 1;
    }
}

void main();
