import { z } from "zod";

export const googleClientCredentialSchema = z.object({
  client_id: z.string().min(1),
  project_id: z.string().optional(),
  auth_uri: z.string().url(),
  token_uri: z.string().url(),
  auth_provider_x509_cert_url: z.string().url().optional(),
  client_secret: z.string().min(1),
  redirect_uris: z.array(z.string().url()).default([]),
  javascript_origins: z.array(z.string().url()).default([]),
});

/**
 * The credential file downloaded from the Google console, wrapped in `web` or `installed`, or flat.
 */
export const googleClientSecretSchema = z.union([
  z.object({ web: googleClientCredentialSchema }).transform((file) => file.web),
  z.object({ installed: googleClientCredentialSchema }).transform((file) => file.installed),
  googleClientCredentialSchema,
]);

export type GoogleClientSecret = z.infer<typeof googleClientCredentialSchema>;
