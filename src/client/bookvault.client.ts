import axios, { AxiosAdapter, AxiosInstance, AxiosResponse } from 'axios';

import type { SessionStore } from './session.store';
import type {
  ClientAccessToken,
  ClientAuthSession,
  ClientBook,
  ClientBookOwnership,
  ClientDevice,
  ClientDeviceRegistration,
  ClientDeviceRemoval,
  ClientDownloadDecision,
  ClientDownloadGrant,
  ClientPurchase,
  ClientPurchaseResult,
  ClientPurchasedBook,
  ClientUser,
  Envelope,
  ListBooksParams,
  LoginRequest,
  PurchaseStatus,
  SearchBooksParams,
  SignupRequest,
} from './types';

export interface BookVaultClientOptions {
  baseURL: string;
  timeoutMs?: number;
  adapter?: AxiosAdapter;
}

/**
 * Cliente HTTP tipado de la API.
 *
 * - Adjunta el access token de la SessionStore en cada request
 * - Guarda la sesión tras login/signup y la limpia en logout o ante un 401
 * - Nunca lanza por status HTTP: devuelve el sobre tal cual llega
 */
export class BookVaultClient {
  private readonly http: AxiosInstance;

  constructor(
    private readonly store: SessionStore,
    options: BookVaultClientOptions,
  ) {
    this.http = axios.create({
      baseURL: options.baseURL,
      timeout: options.timeoutMs ?? 10000,
      adapter: options.adapter,
      headers: { 'Content-Type': 'application/json' },
      validateStatus: () => true,
    });

    this.http.interceptors.request.use((config) => {
      const token = this.store.getAccessToken();
      if (token) {
        config.headers.set('Authorization', `Bearer ${token}`);
      }
      return config;
    });

    this.http.interceptors.response.use((response) => {
      if (response.status === 401) {
        this.store.clear();
      }
      return response;
    });
  }

  // ---------- Auth ----------

  async signup(request: SignupRequest): Promise<Envelope<ClientAuthSession>> {
    const envelope = await this.unwrap(
      this.http.post<Envelope<ClientAuthSession>>('/auth/signup', request),
    );
    this.storeSession(envelope);
    return envelope;
  }

  async login(request: LoginRequest): Promise<Envelope<ClientAuthSession>> {
    const envelope = await this.unwrap(
      this.http.post<Envelope<ClientAuthSession>>('/auth/login', request),
    );
    this.storeSession(envelope);
    return envelope;
  }

  /**
   * Renueva el access token con el refresh token guardado.
   */
  async refresh(): Promise<Envelope<ClientAccessToken>> {
    const refreshToken = this.store.getRefreshToken();
    if (!refreshToken) {
      return { ok: false, statusCode: 401, errors: 'NO_SESSION', message: 'No hay sesión activa' };
    }

    const envelope = await this.unwrap(
      this.http.post<Envelope<ClientAccessToken>>('/auth/refresh', { refreshToken }),
    );
    if (envelope.ok && envelope.data) {
      this.store.updateAccessToken(envelope.data.accessToken);
    }
    return envelope;
  }

  /**
   * La sesión local se descarta aunque la llamada falle.
   */
  async logout(): Promise<Envelope<void>> {
    try {
      return await this.unwrap(this.http.post<Envelope<void>>('/auth/logout'));
    } finally {
      this.store.clear();
    }
  }

  me(): Promise<Envelope<ClientUser>> {
    return this.unwrap(this.http.get<Envelope<ClientUser>>('/auth/me'));
  }

  // ---------- Catálogo ----------

  listBooks(params: ListBooksParams = {}): Promise<Envelope<ClientBook[]>> {
    return this.unwrap(this.http.get<Envelope<ClientBook[]>>('/books', { params }));
  }

  searchBooks(params: SearchBooksParams): Promise<Envelope<ClientBook[]>> {
    return this.unwrap(this.http.get<Envelope<ClientBook[]>>('/books/search', { params }));
  }

  getBook(bookId: string): Promise<Envelope<ClientBook>> {
    return this.unwrap(
      this.http.get<Envelope<ClientBook>>(`/books/${encodeURIComponent(bookId)}`),
    );
  }

  listGenres(): Promise<Envelope<string[]>> {
    return this.unwrap(this.http.get<Envelope<string[]>>('/books/genres'));
  }

  // ---------- Compras ----------

  purchase(bookId: string, paymentMethod: string): Promise<Envelope<ClientPurchaseResult>> {
    return this.unwrap(
      this.http.post<Envelope<ClientPurchaseResult>>('/purchase', { bookId, paymentMethod }),
    );
  }

  listPurchases(status?: PurchaseStatus): Promise<Envelope<ClientPurchase[]>> {
    return this.unwrap(
      this.http.get<Envelope<ClientPurchase[]>>('/purchases', {
        params: status ? { status } : undefined,
      }),
    );
  }

  listPurchasedBooks(): Promise<Envelope<ClientPurchasedBook[]>> {
    return this.unwrap(this.http.get<Envelope<ClientPurchasedBook[]>>('/purchases/books'));
  }

  checkOwnership(bookId: string): Promise<Envelope<ClientBookOwnership>> {
    return this.unwrap(
      this.http.get<Envelope<ClientBookOwnership>>(
        `/books/check-ownership/${encodeURIComponent(bookId)}`,
      ),
    );
  }

  refund(purchaseId: string): Promise<Envelope<ClientPurchase>> {
    return this.unwrap(
      this.http.post<Envelope<ClientPurchase>>(
        `/purchases/${encodeURIComponent(purchaseId)}/refund`,
      ),
    );
  }

  // ---------- Dispositivo ----------

  getDevice(): Promise<Envelope<ClientDevice | null>> {
    return this.unwrap(this.http.get<Envelope<ClientDevice | null>>('/device'));
  }

  registerDevice(deviceId: string, deviceName: string): Promise<Envelope<ClientDeviceRegistration>> {
    return this.unwrap(
      this.http.post<Envelope<ClientDeviceRegistration>>('/device', { deviceId, deviceName }),
    );
  }

  unregisterDevice(): Promise<Envelope<ClientDeviceRemoval>> {
    return this.unwrap(this.http.delete<Envelope<ClientDeviceRemoval>>('/device'));
  }

  // ---------- Descargas ----------

  authorizeDownload(bookId: string): Promise<Envelope<ClientDownloadDecision>> {
    return this.unwrap(
      this.http.get<Envelope<ClientDownloadDecision>>('/download-authorization', {
        params: { bookId },
      }),
    );
  }

  download(bookId: string): Promise<Envelope<ClientDownloadGrant>> {
    return this.unwrap(
      this.http.get<Envelope<ClientDownloadGrant>>(
        `/books/${encodeURIComponent(bookId)}/download`,
      ),
    );
  }

  private async unwrap<T>(request: Promise<AxiosResponse<Envelope<T>>>): Promise<Envelope<T>> {
    const response = await request;
    return response.data;
  }

  private storeSession(envelope: Envelope<ClientAuthSession>): void {
    if (!envelope.ok || !envelope.data) return;
    const { accessToken, refreshToken, user } = envelope.data;
    this.store.setSession({ accessToken, refreshToken, user });
  }
}
