import type { AdminOperation } from '../types'

/**
 * Decides whether an administrative operation may run.
 * Deployments that need real authorization pass their own gate to the
 * ServerManager / ProcessController.
 */
export type PermissionGate = (
  operation: AdminOperation,
) => boolean | Promise<boolean>

export const allowAll: PermissionGate = () => true
