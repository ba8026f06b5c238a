/**
 * Estados posibles de un usuario.
 * `disabled` es el borrado lógico de la cuenta.
 */
export enum UserStatus {
  ACTIVE = 'active',
  DISABLED = 'disabled',
}
