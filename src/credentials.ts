import fs from 'fs';
import { z } from 'zod';

const tokensSchema = z.object({
  access_token: z.string().optional(),
  refresh_token: z.string().optional(),
  expiry_date: z.number().optional(),
  scope: z.string().optional(),
  token_type: z.string().optional(),
});

export type MailboxTokens = z.infer<typeof tokensSchema>;

const clientSecretsSchema = z.object({
  client_id: z.string(),
  client_secret: z.string(),
  redirect_uris: z.array(z.string()).min(1),
});

const credentialsFileSchema = z
  .object({
    installed: clientSecretsSchema.optional(),
    web: clientSecretsSchema.optional(),
  })
  .refine((value) => value.installed || value.web, 'expected an "installed" or "web" client');

export type ClientSecrets = z.infer<typeof clientSecretsSchema>;

/** Resolves a student's credentials handle to mailbox OAuth tokens. */
export interface CredentialStore {
  resolve(handle: string): Promise<MailboxTokens>;
}

/**
 * Reads tokens from a JSON file mapping credentials handles to OAuth tokens.
 * The file is re-read on every lookup so rotated tokens are picked up without
 * a restart.
 */
export class TokenFileCredentialStore implements CredentialStore {
  constructor(private readonly tokensPath: string) {}

  async resolve(handle: string): Promise<MailboxTokens> {
    const raw = await fs.promises.readFile(this.tokensPath, 'utf-8');
    const all = z.record(tokensSchema).parse(JSON.parse(raw));
    const tokens = all[handle];
    if (!tokens) {
      throw new Error(`No mailbox tokens for credentials handle "${handle}"`);
    }
    return tokens;
  }
}

export function loadClientSecrets(credentialsPath: string): ClientSecrets {
  const parsed = credentialsFileSchema.parse(JSON.parse(fs.readFileSync(credentialsPath, 'utf-8')));
  const secrets = parsed.installed ?? parsed.web;
  if (!secrets) {
    throw new Error(`No OAuth client found in ${credentialsPath}`);
  }
  return secrets;
}
