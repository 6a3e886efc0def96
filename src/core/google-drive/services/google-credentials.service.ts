import { Injectable } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import axios from "axios";
import { readFile, writeFile } from "fs/promises";
import { BaseConfigInterface } from "../../../config/interfaces/base.config.interface";
import { ConfigGoogleDriveInterface } from "../../../config/interfaces/config.google.drive.interface";
import { AppLoggingService } from "../../logging/services/logging.service";
import {
  GoogleDriveNotAuthorisedError,
  GoogleDriveNotConfiguredError,
  handleGoogleDriveError,
} from "../errors/google-drive.errors";
import { GoogleClientSecret, googleClientSecretSchema } from "../interfaces/google-client-secret.interface";
import {
  GOOGLE_DRIVE_SCOPE,
  GoogleToken,
  googleTokenResponseSchema,
  googleTokenSchema,
} from "../interfaces/google-token.interface";

/** Tokens expiring within this window are refreshed before use */
const REFRESH_MARGIN_MS = 60_000;

const parseJson = (content: string): unknown => {
  try {
    return JSON.parse(content);
  } catch {
    return undefined;
  }
};

const isMissingFile = (error: unknown): boolean =>
  error instanceof Error && "code" in error && error.code === "ENOENT";

/**
 * Holds the OAuth client credential and the authorised user token used for Drive calls.
 */
@Injectable()
export class GoogleCredentialsService {
  private clientSecret?: GoogleClientSecret;

  constructor(
    private readonly configService: ConfigService<BaseConfigInterface, true>,
    private readonly logger: AppLoggingService,
  ) {}

  private get driveConfig(): ConfigGoogleDriveInterface {
    return this.configService.get("googleDrive", { infer: true });
  }

  async loadClientSecret(): Promise<GoogleClientSecret> {
    if (this.clientSecret) return this.clientSecret;

    const path = this.driveConfig.clientSecretPath;

    let content: string;
    try {
      content = await readFile(path, "utf8");
    } catch (error) {
      if (isMissingFile(error)) throw new GoogleDriveNotConfiguredError(`${path} was not found`);
      throw error;
    }

    const json = parseJson(content);
    if (json === undefined) throw new GoogleDriveNotConfiguredError(`${path} is not valid JSON`);

    const parsed = googleClientSecretSchema.safeParse(json);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((issue) => issue.path.join(".") || issue.message).join(", ");
      throw new GoogleDriveNotConfiguredError(`${path} is not a valid OAuth client credential (${issues})`);
    }

    this.clientSecret = parsed.data;
    return this.clientSecret;
  }

  async isConfigured(): Promise<boolean> {
    try {
      await this.loadClientSecret();
      return true;
    } catch (error) {
      if (error instanceof GoogleDriveNotConfiguredError) return false;
      throw error;
    }
  }

  async isAuthorised(): Promise<boolean> {
    return (await this.readToken()) !== null;
  }

  redirectUri(secret: GoogleClientSecret): string {
    if (this.driveConfig.redirectUri) return this.driveConfig.redirectUri;
    if (secret.redirect_uris.length > 0) return secret.redirect_uris[0];

    return `${this.configService.get("api", { infer: true }).url}google-drive/callback`;
  }

  async generateAuthorisationUrl(state?: string): Promise<string> {
    const secret = await this.loadClientSecret();

    const params = new URLSearchParams({
      client_id: secret.client_id,
      redirect_uri: this.redirectUri(secret),
      response_type: "code",
      scope: GOOGLE_DRIVE_SCOPE,
      access_type: "offline",
      prompt: "consent",
    });
    if (state) params.set("state", state);

    return `${secret.auth_uri}?${params.toString()}`;
  }

  async exchangeCode(code: string): Promise<GoogleToken> {
    const secret = await this.loadClientSecret();

    const token = await this.requestToken(secret, {
      grant_type: "authorization_code",
      code,
      redirect_uri: this.redirectUri(secret),
    });

    await this.saveToken(token);
    this.logger.log("Google Drive access authorised", GoogleCredentialsService.name);

    return token;
  }

  async getAccessToken(): Promise<string> {
    const token = await this.readToken();
    if (!token) throw new GoogleDriveNotAuthorisedError();

    if (token.expiry_date - Date.now() > REFRESH_MARGIN_MS) return token.access_token;

    if (!token.refresh_token) throw new GoogleDriveNotAuthorisedError();

    const secret = await this.loadClientSecret();
    const refreshed = await this.requestToken(secret, {
      grant_type: "refresh_token",
      refresh_token: token.refresh_token,
    });

    const stored: GoogleToken = {
      ...refreshed,
      refresh_token: refreshed.refresh_token ?? token.refresh_token,
    };

    await this.saveToken(stored);
    this.logger.debug("Google Drive access token refreshed", GoogleCredentialsService.name);

    return stored.access_token;
  }

  private async requestToken(secret: GoogleClientSecret, form: Record<string, string>): Promise<GoogleToken> {
    try {
      const response = await axios.post(
        secret.token_uri,
        new URLSearchParams({
          client_id: secret.client_id,
          client_secret: secret.client_secret,
          ...form,
        }).toString(),
        {
          headers: {
            "Content-Type": "application/x-www-form-urlencoded",
          },
        },
      );

      const body = googleTokenResponseSchema.parse(response.data);

      return {
        access_token: body.access_token,
        refresh_token: body.refresh_token,
        scope: body.scope ?? GOOGLE_DRIVE_SCOPE,
        token_type: body.token_type,
        expiry_date: Date.now() + body.expires_in * 1000,
      };
    } catch (error) {
      handleGoogleDriveError(error);
    }
  }

  private async readToken(): Promise<GoogleToken | null> {
    const path = this.driveConfig.tokenPath;

    let content: string;
    try {
      content = await readFile(path, "utf8");
    } catch (error) {
      if (isMissingFile(error)) return null;
      throw error;
    }

    const parsed = googleTokenSchema.safeParse(parseJson(content));
    if (parsed.success) return parsed.data;

    this.logger.warn(`Ignoring invalid Google Drive token file ${path}`, GoogleCredentialsService.name);
    return null;
  }

  private async saveToken(token: GoogleToken): Promise<void> {
    await writeFile(this.driveConfig.tokenPath, JSON.stringify(token, null, 2), { encoding: "utf8", mode: 0o600 });
  }
}
