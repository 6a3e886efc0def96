import { BadRequestException, Controller, Get, Query, Res } from "@nestjs/common";
import { ApiOperation, ApiQuery, ApiResponse, ApiTags } from "@nestjs/swagger";
import { FastifyReply } from "fastify";
import { GoogleCredentialsService } from "../services/google-credentials.service";

@ApiTags("google-drive")
@Controller("google-drive")
export class GoogleDriveController {
  constructor(private readonly credentials: GoogleCredentialsService) {}

  @Get("authorise")
  @ApiOperation({ summary: "Redirect to the Google consent screen for Drive access" })
  @ApiResponse({ status: 302, description: "Redirect to Google" })
  @ApiResponse({ status: 503, description: "The OAuth client credential is missing or invalid" })
  async authorise(@Res() reply: FastifyReply): Promise<void> {
    const url = await this.credentials.generateAuthorisationUrl();

    reply.redirect(url, 302);
  }

  @Get("callback")
  @ApiOperation({ summary: "Receive the authorisation code and store the Drive token" })
  @ApiQuery({ name: "code", required: false })
  @ApiQuery({ name: "error", required: false })
  async callback(@Query("code") code?: string, @Query("error") error?: string): Promise<{ detail: string }> {
    if (error) throw new BadRequestException(`Google Drive authorisation was refused: ${error}`);
    if (!code) throw new BadRequestException("Missing authorisation code");

    await this.credentials.exchangeCode(code);

    return { detail: "Google Drive authorised" };
  }

  @Get("status")
  @ApiOperation({ summary: "Tell whether Drive credentials are configured and authorised" })
  async status(): Promise<{ configured: boolean; authorised: boolean }> {
    const configured = await this.credentials.isConfigured();
    const authorised = configured ? await this.credentials.isAuthorised() : false;

    return { configured, authorised };
  }
}
