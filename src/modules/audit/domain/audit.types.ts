export type AuditResult = 'ALLOW' | 'DENY' | 'ERROR';

export type AuditSeverity = 'LOW' | 'MEDIUM' | 'HIGH' | 'CRITICAL';

/**
 * Opciones comunes para un registro de auditoría.
 */
export interface AuditOptions {
  module: string;
  severity: AuditSeverity;
  tags?: string[];
  resourceId?: string;
  changes?: {
    before?: Record<string, unknown>;
    after?: Record<string, unknown>;
  };
  metadata?: Record<string, unknown>;
}
