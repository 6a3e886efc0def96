export * from "./google-drive.module";
export * from "./services/google-credentials.service";
export * from "./services/google-drive.service";
export * from "./errors/google-drive.errors";
export * from "./interfaces/google-client-secret.interface";
export * from "./interfaces/google-token.interface";
export * from "./interfaces/google-drive-file.interface";
