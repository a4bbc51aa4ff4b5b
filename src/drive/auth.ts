import fs from "fs";
import path from "path";
import { google, type drive_v3 } from "googleapis";
import { ConfigurationError, errorMessage } from "../errors.js";
import { createLogger } from "../logger.js";

const logger = createLogger("auth");

export const DRIVE_SCOPES = ["https://www.googleapis.com/auth/drive.readonly"];

export const DEFAULT_CREDENTIAL_PATHS = [
    "credentials/google_service_account.json",
    "deployment/credentials/google_service_account.json",
    "google_service_account.json",
];

/**
 * The configured key file when given, otherwise the first default path that
 * exists under `baseDir`. Throws ConfigurationError when there is none.
 */
export function resolveCredentialsFile(
    configured: string | undefined,
    baseDir: string = process.cwd(),
    exists: (file: string) => boolean = fs.existsSync
): string {
    if (configured) {
        const file = path.resolve(baseDir, configured);
        if (!exists(file)) {
            throw new ConfigurationError(`Credentials file not found: ${file}`, { file });
        }
        return file;
    }

    const candidates = DEFAULT_CREDENTIAL_PATHS.map(candidate => path.resolve(baseDir, candidate));
    const found = candidates.find(candidate => exists(candidate));
    if (!found) {
        throw new ConfigurationError(
            "No service account credentials found. Set GOOGLE_DRIVE_CREDENTIALS_FILE or pass the key file path as an argument.",
            { searched: candidates }
        );
    }
    return found;
}

export function createDriveApi(credentialsFile: string): drive_v3.Drive {
    const auth = new google.auth.GoogleAuth({ keyFile: credentialsFile, scopes: DRIVE_SCOPES });
    return google.drive({ version: "v3", auth });
}

// Fails fast on a bad key instead of on the first tool call.
export async function verifyConnection(drive: drive_v3.Drive): Promise<string> {
    try {
        const response = await drive.about.get({ fields: "user(emailAddress, displayName)" });
        const account = response.data.user?.emailAddress ?? "unknown account";
        logger.info(`Connected to Google Drive as ${account}`);
        return account;
    } catch (error) {
        throw new ConfigurationError(`Google Drive authentication failed: ${errorMessage(error)}`);
    }
}
