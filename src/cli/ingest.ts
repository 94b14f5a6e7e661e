import path from "node:path";
import { DocumentAssistant } from "../assistant/documentAssistant";
import { loadAppConfig, resolveConfigPath } from "../config/loadConfig";
import { ingestDocument } from "../ingest/pipeline";
import { createLLMClient } from "../llm/factory";
import { InMemorySessionStore } from "../session/store";
import { configureLogger, getLogger } from "../utils/logger";
import { TiktokenTokenizer } from "../utils/tokenEncoder";
import { INGEST_USAGE, parseIngestArgs } from "./args";

async function main(): Promise<void> {
    const options = parseIngestArgs(process.argv.slice(2));
    if (options.help) {
        console.log(INGEST_USAGE);
        return;
    }
    if (!options.filePath) {
        console.error(INGEST_USAGE);
        process.exitCode = 1;
        return;
    }

    const config = await loadAppConfig(options.configPath);
    const logger = configureLogger(config.logging);
    logger.info(`Loaded configuration from ${resolveConfigPath(options.configPath)}`);

    const llm = createLLMClient(config.llm, logger);
    const { chunks, stats } = await ingestDocument(options.filePath, {
        tokenizer: new TiktokenTokenizer(config.chunking.tokenizerModel),
        embedding: llm.embedding,
        chunking: config.chunking,
        logger,
    });

    logger.info(`Characters: ${stats.characters}`);
    logger.info(`Chunks: ${stats.chunks}`);
    logger.info(`Pages: ${stats.pages}`);
    logger.info(`Oversized chunks: ${stats.oversizedChunks}`);

    const session = new InMemorySessionStore().create({
        filename: path.basename(options.filePath),
        chunks,
    });
    const assistant = new DocumentAssistant({
        chat: llm.chat,
        embedding: llm.embedding,
        assistant: config.assistant,
        retrieval: config.retrieval,
        logger,
    });

    const summary = await assistant.generateSummary(session);
    console.log(`Summary:\n${summary}`);

    for (const question of options.questions) {
        const response = await assistant.answerQuestion(session, question);
        console.log(`\nQ: ${question}\nA: ${response.answer}\n(${response.source}; confidence ${response.confidence.toFixed(2)})`);
    }
}

main().catch((error: unknown) => {
    getLogger().error({ err: error }, "Document ingestion failed.");
    process.exitCode = 1;
});
