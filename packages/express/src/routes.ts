/**
 * Route paths the library mounts.
 */
export const Routes = {
  /**
   * GET /api/health
   * Database connectivity probe.
   */
  Health: '/api/health',

  /**
   * /assets/*
   * Built front-end assets; missing files 404 instead of falling back to index.html.
   */
  Assets: '/assets',
} as const;

export type RouteName = keyof typeof Routes;
export type RoutePath = (typeof Routes)[RouteName];
