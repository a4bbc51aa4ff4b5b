#!/usr/bin/env node

import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import dotenv from "dotenv";
import { loadConfig, type AppConfig } from "./src/config.js";
import { DriveClient } from "./src/drive/client.js";
import { createDriveApi, resolveCredentialsFile, verifyConnection } from "./src/drive/auth.js";
import { errorMessage } from "./src/errors.js";
import { configureLogging, createLogger } from "./src/logger.js";
import { SERVER_NAME, SERVER_VERSION, createServer } from "./src/server.js";

const logger = createLogger("main");

dotenv.config();

// Usage: mcp-server-mindmup-gdrive [credentials-file]
function readConfig(): Readonly<AppConfig> {
    const config = loadConfig();
    const [credentialsArg] = process.argv.slice(2);
    return credentialsArg ? Object.freeze({ ...config, credentialsFile: credentialsArg }) : config;
}

async function runServer() {
    const config = readConfig();
    configureLogging({ level: config.logLevel, format: config.logFormat });

    const credentialsFile = resolveCredentialsFile(config.credentialsFile);
    logger.info(`Using service account key ${credentialsFile}`);
    const driveApi = createDriveApi(credentialsFile);
    await verifyConnection(driveApi);

    const server = createServer({ drive: new DriveClient(driveApi), config });
    const transport = new StdioServerTransport();
    await server.connect(transport);
    logger.info(`${SERVER_NAME} ${SERVER_VERSION} running on stdio`);
}

runServer().catch((error) => {
    logger.error(`Fatal error running server: ${errorMessage(error)}`, error);
    process.exit(1);
});
