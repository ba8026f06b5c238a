import type { AccessTokenDTO, AuthSessionDTO } from '../modules/auth/dto/auth-response.dto';
import type { BookDTO } from '../modules/books/dto/book.dto';
import type { DeviceRegistrationResultDTO, DeviceRemovalResultDTO } from '../modules/devices/dto/device-registration.dto';
import type { DownloadDecision } from '../modules/entitlements/domain/download-policy';
import type { DownloadGrantDTO } from '../modules/entitlements/dto/download-grant.dto';
import type { PurchaseStatus } from '../modules/purchases/domain/entities/purchase.entity';
import type {
  BookOwnershipDTO,
  PurchaseDTO,
  PurchaseResultDTO,
  PurchasedBookDTO,
} from '../modules/purchases/dto/purchase.dto';
import type { DeviceRegistration } from '../modules/users/domain/entities/user.entity';
import type { UserDTO } from '../modules/users/dto/user.dto';

/**
 * Forma JSON de un tipo del servidor: las fechas viajan como string ISO.
 */
export type Wire<T> = T extends Date
  ? string
  : T extends Array<infer U>
    ? Array<Wire<U>>
    : T extends object
      ? { [K in keyof T]: Wire<T[K]> }
      : T;

/**
 * Sobre común de todas las respuestas de la API.
 */
export interface Envelope<T> {
  ok: boolean;
  statusCode: number;
  data?: T;
  errors?: string | string[];
  message?: string;
  meta?: Record<string, unknown>;
}

export type ClientUser = Wire<UserDTO>;
export type ClientBook = Wire<BookDTO>;
export type ClientPurchase = Wire<PurchaseDTO>;
export type ClientPurchaseResult = Wire<PurchaseResultDTO>;
export type ClientPurchasedBook = Wire<PurchasedBookDTO>;
export type ClientBookOwnership = BookOwnershipDTO;
export type ClientDevice = Wire<DeviceRegistration>;
export type ClientDeviceRegistration = Wire<DeviceRegistrationResultDTO>;
export type ClientDeviceRemoval = DeviceRemovalResultDTO;
export type ClientAuthSession = Wire<AuthSessionDTO>;
export type ClientAccessToken = AccessTokenDTO;
export type ClientDownloadDecision = DownloadDecision;
export type ClientDownloadGrant = DownloadGrantDTO;
export type { PurchaseStatus };

export interface SignupRequest {
  email: string;
  password: string;
  firstName: string;
  lastName: string;
}

export interface LoginRequest {
  email: string;
  password: string;
}

export interface ListBooksParams {
  page?: number;
  limit?: number;
  search?: string;
  genre?: string;
  sortBy?: 'title' | 'author' | 'price' | 'rating' | 'publishedDate';
  sortOrder?: 'asc' | 'desc';
}

export interface SearchBooksParams {
  q?: string;
  author?: string;
  genre?: string;
  minPrice?: number;
  maxPrice?: number;
  minRating?: number;
  page?: number;
  limit?: number;
}
