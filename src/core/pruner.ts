import { AuthorizationFlow } from './auth/flow.js';
import { AuthSession } from './auth/session.js';
import { FileCredentialStore, MemoryCredentialStore, type CredentialStore } from './auth/store.js';
import { GoogleTokenEndpoint, createAuthorizedClient, type TokenEndpoint } from './auth/google.js';
import { createGooglePlaylistApi, type PlaylistApi } from './youtube/api.js';
import { YouTubeClient, parsePlaylistId } from './youtube/client.js';
import { AuditLog } from './audit/log.js';
import { BatchRemover, type RemovalCallbacks } from './removal/remover.js';
import { PaginationError, ReauthorizationRequiredError, YouTubeApiError } from './errors.js';
import type {
  AppConfig,
  AuditFilter,
  AuditRecord,
  Credential,
  Playlist,
  PlaylistItem,
  RemovalResult,
} from '../types/index.js';

export interface PrunerCallbacks {
  onProgress?: (message: string) => void;
  onDebug?: (message: string) => void;
  onSessionReset?: (error: Error) => void;
}

export interface PrunerDependencies {
  endpoint: TokenEndpoint;
  store: CredentialStore;
  audit: AuditLog;
  createApi?: (credential: Credential) => PlaylistApi;
}

function defaultCreateApi(credential: Credential): PlaylistApi {
  return createGooglePlaylistApi(createAuthorizedClient(credential));
}

export function createCredentialStore(config: AppConfig): CredentialStore {
  return config.sessionOnly
    ? new MemoryCredentialStore()
    : new FileCredentialStore(config.credentialsFile);
}

export class PlaylistPruner {
  readonly flow: AuthorizationFlow;
  readonly session: AuthSession;
  private audit: AuditLog;
  private createApi: (credential: Credential) => PlaylistApi;

  constructor(
    private readonly config: AppConfig,
    deps: PrunerDependencies,
    private readonly callbacks: PrunerCallbacks = {}
  ) {
    this.flow = new AuthorizationFlow(deps.endpoint, deps.store, {
      clientId: config.clientId,
      clientSecret: config.clientSecret,
      scopes: config.scopes,
    });
    this.session = new AuthSession(deps.endpoint, deps.store, {
      requiredScopes: config.scopes,
      onDebug: callbacks.onDebug,
    });
    this.audit = deps.audit;
    this.createApi = deps.createApi ?? defaultCreateApi;
  }

  static fromConfig(config: AppConfig, callbacks: PrunerCallbacks = {}): PlaylistPruner {
    return new PlaylistPruner(
      config,
      {
        endpoint: new GoogleTokenEndpoint(config),
        store: createCredentialStore(config),
        audit: new AuditLog(config.auditDb),
      },
      callbacks
    );
  }

  async listPlaylists(options: { all?: boolean } = {}): Promise<Playlist[]> {
    return this.guard(async () => {
      const youtube = await this.youtube();
      this.callbacks.onProgress?.('Fetching playlists...');
      return youtube.listPlaylists(options);
    });
  }

  async listPlaylistItems(playlistId: string): Promise<PlaylistItem[]> {
    return this.guard(async () => {
      const youtube = await this.youtube();
      this.callbacks.onProgress?.(`Fetching items of playlist ${playlistId}...`);
      return youtube.listPlaylistItems(playlistId);
    });
  }

  /**
   * Resolves a playlist id (or URL) against the user's playlists so the audit
   * log can record its name. Unknown ids fall back to the id as the name.
   */
  async resolvePlaylist(idOrUrl: string): Promise<Playlist> {
    return this.guard(async () => {
      const playlistId = parsePlaylistId(idOrUrl);
      const youtube = await this.youtube();
      const playlists = await youtube.listPlaylists({ all: true });
      return playlists.find((playlist) => playlist.id === playlistId) ?? { id: playlistId, title: playlistId };
    });
  }

  async removeItems(
    playlist: Playlist,
    items: PlaylistItem[],
    callbacks: RemovalCallbacks = {}
  ): Promise<RemovalResult> {
    // Per-item failures are part of the result; only failing to obtain a
    // credential up front goes through the reset policy.
    const youtube = await this.guard(() => this.youtube());
    const remover = new BatchRemover(youtube, this.audit);
    return remover.removeItems(playlist, items, callbacks);
  }

  auditRecords(filter: AuditFilter = {}): AuditRecord[] {
    return this.audit.list(filter);
  }

  close(): void {
    this.audit.close();
  }

  private async youtube(): Promise<YouTubeClient> {
    const credential = await this.session.getValidCredential();
    return new YouTubeClient(this.createApi(credential), { onDebug: this.callbacks.onDebug });
  }

  /**
   * Any auth or fetch failure clears the stored session so the next command
   * starts with a fresh sign-in. Disabled with resetOnError=false.
   */
  private async guard<T>(operation: () => Promise<T>): Promise<T> {
    try {
      return await operation();
    } catch (error) {
      if (this.config.resetOnError && shouldResetSession(error)) {
        await this.session.reset();
        this.callbacks.onSessionReset?.(error);
      }
      throw error;
    }
  }
}

function shouldResetSession(error: unknown): error is Error {
  return (
    error instanceof ReauthorizationRequiredError ||
    error instanceof YouTubeApiError ||
    error instanceof PaginationError
  );
}
