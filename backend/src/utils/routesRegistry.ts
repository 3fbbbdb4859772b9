import { RequestHandler } from 'express';
import { RouteParameters } from 'express-serve-static-core';

type HttpMethod = 'get' | 'post' | 'delete';

type RouteInfo = {
  method: HttpMethod;
  path: string;
  handler: RequestHandler;
}

const routesRegistry = new Map<string, RouteInfo>();

export const registerRoute = <
  TMethod extends HttpMethod,
  TRoute extends string,
  TParams = RouteParameters<TRoute>,
>(method: TMethod, path: TRoute, handler: RequestHandler<TParams>) => {
  const key = `${method.toUpperCase()} ${path}`;
  if (routesRegistry.has(key)) {
    throw new Error(`Route registered twice: ${key}`);
  }
  routesRegistry.set(key, { method, path, handler: handler as never });
};

export const getRouteEntries = (): RouteInfo[] => [...routesRegistry.values()];

/** `METHOD path` lines, in registration order. */
export const describeRoutes = (): string[] => [...routesRegistry.keys()];
