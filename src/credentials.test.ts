import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { loadClientSecrets, TokenFileCredentialStore } from './credentials';

describe('credentials', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'credentials-test-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  describe('TokenFileCredentialStore', () => {
    it('should resolve tokens by handle', async () => {
      const tokensPath = path.join(dir, 'tokens.json');
      fs.writeFileSync(
        tokensPath,
        JSON.stringify({ 'asha-handle': { access_token: 'test-access', refresh_token: 'test-refresh' } })
      );
      const store = new TokenFileCredentialStore(tokensPath);

      await expect(store.resolve('asha-handle')).resolves.toEqual({
        access_token: 'test-access',
        refresh_token: 'test-refresh',
      });
    });

    it('should pick up rotated tokens without a restart', async () => {
      const tokensPath = path.join(dir, 'tokens.json');
      fs.writeFileSync(tokensPath, JSON.stringify({ h: { access_token: 'old' } }));
      const store = new TokenFileCredentialStore(tokensPath);
      await store.resolve('h');

      fs.writeFileSync(tokensPath, JSON.stringify({ h: { access_token: 'new' } }));

      await expect(store.resolve('h')).resolves.toEqual({ access_token: 'new' });
    });

    it('should fail for an unknown handle', async () => {
      const tokensPath = path.join(dir, 'tokens.json');
      fs.writeFileSync(tokensPath, '{}');

      await expect(new TokenFileCredentialStore(tokensPath).resolve('missing')).rejects.toThrow(
        'No mailbox tokens for credentials handle "missing"'
      );
    });
  });

  describe('loadClientSecrets', () => {
    it('should accept an installed client', () => {
      const credentialsPath = path.join(dir, 'credentials.json');
      fs.writeFileSync(
        credentialsPath,
        JSON.stringify({
          installed: { client_id: 'test-client', client_secret: 'test-secret', redirect_uris: ['http://localhost'] },
        })
      );

      expect(loadClientSecrets(credentialsPath)).toEqual({
        client_id: 'test-client',
        client_secret: 'test-secret',
        redirect_uris: ['http://localhost'],
      });
    });

    it('should reject a file without a client', () => {
      const credentialsPath = path.join(dir, 'credentials.json');
      fs.writeFileSync(credentialsPath, JSON.stringify({ other: {} }));

      expect(() => loadClientSecrets(credentialsPath)).toThrow();
    });
  });
});
