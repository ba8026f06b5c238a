/**
 * Usuario autenticado de la request, derivado del access token.
 * Nunca guarda el token.
 */
export interface Actor {
  actorType: 'user';
  actorId: string;
  sub: string; // `user:{id}` tal cual viene en el token
  jti?: string;
}

const USER_SUBJECT = /^user:(.+)$/;

/**
 * `user:{id}` → `{ actorType, actorId }`; cualquier otro formato → null.
 */
export function parseSubject(
  sub: string,
): Pick<Actor, 'actorType' | 'actorId'> | null {
  const match = USER_SUBJECT.exec(sub);
  return match ? { actorType: 'user', actorId: match[1] } : null;
}

export function toSubject(userId: string): string {
  return `user:${userId}`;
}

export function isActor(value: unknown): value is Actor {
  return (
    typeof value === 'object' &&
    value !== null &&
    'actorId' in value &&
    typeof value.actorId === 'string' &&
    'sub' in value &&
    typeof value.sub === 'string'
  );
}
