export const ADMIN_ROLE = "admin";
export const USERS_ROLE = "users";

export type LandingRoute = "/admin" | "/user" | "/no-role";

/** True when every required role is held. Extra held roles are fine. */
export function hasRoles(held: readonly string[], required: readonly string[]): boolean {
  const heldSet = new Set(held);
  return required.every((role) => heldSet.has(role));
}

/** Where to send a user after login. Admin wins over users. */
export function landingRouteFor(roles: readonly string[]): LandingRoute {
  if (roles.includes(ADMIN_ROLE)) return "/admin";
  if (roles.includes(USERS_ROLE)) return "/user";
  return "/no-role";
}
