import type { Logger } from "pino";
import type { DocumentAssistant } from "../../assistant/documentAssistant";
import type { AppConfig } from "../../config/types";
import type { LLMClientBundle } from "../../llm/types";
import type { SessionStore } from "../../session/store";
import type { Tokenizer } from "../../utils/tokenEncoder";

export interface ServerContext {
    config: AppConfig;
    llm: LLMClientBundle;
    tokenizer: Tokenizer;
    sessions: SessionStore;
    assistant: DocumentAssistant;
    logger: Logger;
}
