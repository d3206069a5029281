import crypto from 'crypto';
import { google, gmail_v1 } from 'googleapis';
import { OAuth2Client } from 'google-auth-library';
import { ClientSecrets, CredentialStore } from './credentials';
import { Identity, MailboxSession, MessageRef, MessageSource, RawMessage } from './types';

const UNREAD_QUERY = 'is:unread in:inbox';
const IDENTITY_HEADERS = ['Message-ID', 'Date'];

export function fingerprintOf(messageId: string, receivedAt: string): string {
  return crypto.createHash('sha256').update(`${messageId}:${receivedAt}`).digest('hex');
}

function decodeBody(data: string): string {
  return Buffer.from(data, 'base64').toString('utf-8');
}

function htmlToText(html: string): string {
  return html
    .replace(/<(script|style)[^>]*>[\s\S]*?<\/\1>/gi, ' ')
    .split('<').join(' <')
    .replace(/<[^>]*>/g, ' ')
    .replace(/&nbsp;/g, ' ')
    .replace(/&amp;/g, '&')
    .replace(/\s+/g, ' ')
    .trim();
}

function headerReader(message: gmail_v1.Schema$Message): (name: string) => string {
  const headers = message.payload?.headers ?? [];
  return (name) => {
    const header = headers.find((h) => h.name?.toLowerCase() === name.toLowerCase());
    return header?.value ?? '';
  };
}

/** Works on `metadata` and `full` responses alike. */
export function toMessageRef(message: gmail_v1.Schema$Message): MessageRef {
  const getHeader = headerReader(message);
  const sourceId = message.id ?? '';
  const receivedMs = message.internalDate ? Number(message.internalDate) : Date.parse(getHeader('Date'));
  const receivedAt = Number.isFinite(receivedMs) ? new Date(receivedMs).toISOString() : new Date(0).toISOString();
  const messageId = getHeader('Message-ID') || sourceId;
  return { sourceId, receivedAt, fingerprint: fingerprintOf(messageId, receivedAt) };
}

export function toRawMessage(studentId: string, message: gmail_v1.Schema$Message): RawMessage {
  const getHeader = headerReader(message);

  let htmlContent = '';
  let plainText = '';

  const extractParts = (parts: gmail_v1.Schema$MessagePart[]): void => {
    for (const part of parts) {
      if (part.mimeType === 'text/html' && part.body?.data) {
        htmlContent += decodeBody(part.body.data);
      } else if (part.mimeType === 'text/plain' && part.body?.data) {
        plainText += decodeBody(part.body.data);
      } else if (part.parts) {
        extractParts(part.parts);
      }
    }
  };

  const payload = message.payload;
  if (payload?.body?.data) {
    // Single part message
    const content = decodeBody(payload.body.data);
    if (payload.mimeType === 'text/html') {
      htmlContent = content;
    } else {
      plainText = content;
    }
  } else if (payload?.parts) {
    extractParts(payload.parts);
  }

  return {
    studentId,
    ...toMessageRef(message),
    subject: getHeader('Subject'),
    from: getHeader('From'),
    body: plainText.trim() || htmlToText(htmlContent),
  };
}

export class GmailMailboxSession implements MailboxSession {
  private readonly gmail: gmail_v1.Gmail;

  constructor(private readonly identity: Identity, auth: OAuth2Client) {
    this.gmail = google.gmail({ version: 'v1', auth });
  }

  async listMessageIds(query: string, signal?: AbortSignal, maxResults: number = 100): Promise<string[]> {
    const ids: string[] = [];
    let pageToken: string | undefined;

    do {
      const response = await this.gmail.users.messages.list(
        {
          userId: 'me',
          q: query,
          maxResults,
          pageToken,
        },
        { signal }
      );

      for (const message of response.data.messages ?? []) {
        if (message.id) ids.push(message.id);
      }

      pageToken = response.data.nextPageToken ?? undefined;
    } while (pageToken);

    return ids;
  }

  async listUnread(signal?: AbortSignal): Promise<MessageRef[]> {
    const ids = await this.listMessageIds(UNREAD_QUERY, signal);
    const refs: MessageRef[] = [];

    for (const id of ids) {
      const response = await this.gmail.users.messages.get(
        { userId: 'me', id, format: 'metadata', metadataHeaders: IDENTITY_HEADERS },
        { signal }
      );
      refs.push(toMessageRef(response.data));
    }

    return refs.sort((a, b) => a.receivedAt.localeCompare(b.receivedAt));
  }

  async fetchMessages(refs: MessageRef[], signal?: AbortSignal): Promise<RawMessage[]> {
    const messages: RawMessage[] = [];
    for (const ref of refs) {
      const response = await this.gmail.users.messages.get({ userId: 'me', id: ref.sourceId, format: 'full' }, { signal });
      messages.push(toRawMessage(this.identity.studentId, response.data));
    }
    return messages;
  }

  async markRead(message: RawMessage, signal?: AbortSignal): Promise<void> {
    await this.gmail.users.messages.modify(
      {
        userId: 'me',
        id: message.sourceId,
        requestBody: { removeLabelIds: ['UNREAD'] },
      },
      { signal }
    );
  }

  async close(): Promise<void> {
    // HTTP transport: nothing to tear down beyond dropping the client
  }
}

/**
 * Gmail-backed MessageSource. Each session gets its own OAuth client built
 * from the shared app secrets and the student's stored tokens.
 */
export class GmailMessageSource implements MessageSource {
  constructor(
    private readonly secrets: ClientSecrets,
    private readonly credentials: CredentialStore
  ) {}

  async connect(identity: Identity): Promise<GmailMailboxSession> {
    const tokens = await this.credentials.resolve(identity.credentialsHandle);
    const { client_id, client_secret, redirect_uris } = this.secrets;
    const oAuth2Client = new google.auth.OAuth2(client_id, client_secret, redirect_uris[0]);
    oAuth2Client.setCredentials(tokens);
    return new GmailMailboxSession(identity, oAuth2Client);
  }
}
