import fs from "node:fs/promises";
import type { Logger } from "pino";

/** Removes a session's upload directory; a failure is logged and otherwise ignored. */
export async function removeUploadDir(uploadDir: string, logger: Logger): Promise<void> {
    try {
        await fs.rm(uploadDir, { recursive: true, force: true });
    } catch (error) {
        logger.warn({ err: error, uploadDir }, "Failed to remove upload directory.");
    }
}
