import * as joi from 'joi';

import { UserStatus } from '../modules/users/domain/enums/enums';
import type { SessionStorage } from './session-storage';
import type { ClientUser } from './types';

export const SESSION_STORAGE_KEY = 'bookvault.session';

export interface StoredSession {
  accessToken: string;
  refreshToken: string;
  user: ClientUser;
}

export type SessionListener = (session: StoredSession | null) => void;

const deviceSchema = joi.object({
  deviceId: joi.string().required(),
  deviceName: joi.string().allow('').required(),
  registeredAt: joi.string().isoDate().required(),
});

const clientUserSchema = joi.object<ClientUser>({
  id: joi.string().required(),
  email: joi.string().required(),
  firstName: joi.string().allow('').required(),
  lastName: joi.string().allow('').required(),
  status: joi
    .string()
    .valid(...Object.values(UserStatus))
    .required(),
  registeredDevice: deviceSchema.allow(null).required(),
  purchasedBookIds: joi.array().items(joi.string()).required(),
  createdAt: joi.string().isoDate().required(),
  updatedAt: joi.string().isoDate().required(),
});

const storedSessionSchema = joi.object<StoredSession>({
  accessToken: joi.string().required(),
  refreshToken: joi.string().required(),
  user: clientUserSchema.required(),
});

/**
 * Estado de sesión del cliente.
 *
 * Ciclo de vida explícito: `hydrate()` al arrancar, `setSession()` tras login
 * o signup, `clear()` en logout o ante un 401. Los suscriptores reciben cada
 * cambio.
 */
export class SessionStore {
  private session: StoredSession | null = null;
  private readonly listeners = new Set<SessionListener>();

  constructor(
    private readonly storage: SessionStorage,
    private readonly key: string = SESSION_STORAGE_KEY,
  ) {}

  /**
   * Carga la sesión persistida. Un valor corrupto o incompleto se borra.
   */
  hydrate(): StoredSession | null {
    const raw = this.storage.getItem(this.key);
    this.session = raw === null ? null : this.parse(raw);
    if (raw !== null && this.session === null) {
      this.storage.removeItem(this.key);
    }
    this.notify();
    return this.session;
  }

  getSession(): StoredSession | null {
    return this.session;
  }

  getAccessToken(): string | null {
    return this.session?.accessToken ?? null;
  }

  getRefreshToken(): string | null {
    return this.session?.refreshToken ?? null;
  }

  isAuthenticated(): boolean {
    return this.session !== null;
  }

  setSession(session: StoredSession): void {
    this.session = session;
    this.storage.setItem(this.key, JSON.stringify(session));
    this.notify();
  }

  /**
   * Sustituye el access token conservando el resto. Sin sesión no hace nada.
   */
  updateAccessToken(accessToken: string): void {
    if (!this.session) return;
    this.setSession({ ...this.session, accessToken });
  }

  clear(): void {
    const hadSession = this.session !== null;
    this.session = null;
    this.storage.removeItem(this.key);
    if (hadSession) {
      this.notify();
    }
  }

  subscribe(listener: SessionListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private parse(raw: string): StoredSession | null {
    let candidate: unknown;
    try {
      candidate = JSON.parse(raw);
    } catch {
      return null;
    }

    const { error, value } = storedSessionSchema.validate(candidate);
    return error ? null : value;
  }

  private notify(): void {
    for (const listener of this.listeners) {
      listener(this.session);
    }
  }
}
