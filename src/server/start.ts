import { getLogger } from "../utils/logger";
import { startServer } from "./server";

async function main(): Promise<void> {
    const running = await startServer();

    const shutdown = (signal: NodeJS.Signals): void => {
        getLogger().info({ signal }, "Shutting down server.");
        running.close().catch((error: unknown) => {
            getLogger().error({ err: error }, "Failed to close server cleanly.");
            process.exitCode = 1;
        });
    };

    process.once("SIGINT", shutdown);
    process.once("SIGTERM", shutdown);
}

main().catch((error: unknown) => {
    getLogger().error({ err: error }, "Server failed to start.");
    process.exitCode = 1;
});
