import type { Actor, Capabilities, CrudAction, ViewAction, ViewConfiguration } from "../types/crud";

type PermissionConfig = Pick<ViewConfiguration, "readOnlyMode" | "permissions" | "permissionRequired">;

export type AuthorizationResult = { allowed: true } | { allowed: false; reason: string };

const denialMessages: Record<CrudAction, string> = {
  create: "You don't have permission to create new items.",
  read: "You don't have permission to view this content.",
  update: "You don't have permission to edit items.",
  delete: "You don't have permission to delete items."
};

const viewActionMap: Record<ViewAction, CrudAction> = {
  list: "read",
  view: "read",
  create: "create",
  edit: "update",
  delete: "delete"
};

export const crudActionFor = (action: ViewAction) => viewActionMap[action];

const deny = (action: CrudAction): AuthorizationResult => ({ allowed: false, reason: denialMessages[action] });

export const authorize = (action: CrudAction, actor: Actor, config: PermissionConfig): AuthorizationResult => {
  if (config.readOnlyMode && action !== "read") {
    return deny(action);
  }

  if (config.permissionRequired && !actor.isSuperuser) {
    const granted = actor.permissions ?? [];
    if (!granted.includes(config.permissionRequired)) {
      return deny(action);
    }
  }

  const requiredRoles = config.permissions[action] ?? [];
  if (requiredRoles.length === 0) {
    return { allowed: true };
  }

  if (actor.isSuperuser) {
    return { allowed: true };
  }

  const roles = new Set(actor.roles);
  return requiredRoles.some((role) => roles.has(role)) ? { allowed: true } : deny(action);
};

export const can = (action: CrudAction, actor: Actor, config: PermissionConfig) =>
  authorize(action, actor, config).allowed;

export const describeCapabilities = (actor: Actor, config: PermissionConfig): Capabilities => ({
  canCreate: can("create", actor, config),
  canRead: can("read", actor, config),
  canUpdate: can("update", actor, config),
  canDelete: can("delete", actor, config)
});
