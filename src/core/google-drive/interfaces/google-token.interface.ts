import { z } from "zod";

export const GOOGLE_DRIVE_SCOPE = "https://www.googleapis.com/auth/drive.file";

/** Token as stored in the token file; `expiry_date` is in epoch milliseconds */
export const googleTokenSchema = z.object({
  access_token: z.string().min(1),
  refresh_token: z.string().optional(),
  scope: z.string().default(GOOGLE_DRIVE_SCOPE),
  token_type: z.string().default("Bearer"),
  expiry_date: z.number(),
});

export type GoogleToken = z.infer<typeof googleTokenSchema>;

/** Body returned by the OAuth token endpoint */
export const googleTokenResponseSchema = z.object({
  access_token: z.string().min(1),
  expires_in: z.number(),
  refresh_token: z.string().optional(),
  scope: z.string().optional(),
  token_type: z.string().default("Bearer"),
});
