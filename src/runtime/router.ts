import type { HttpMethod, HttpResponseParts, RawHttpRequest, RouteParams } from '../shared/protocol.js';

export type RouteHandler = (request: RawHttpRequest) => Promise<HttpResponseParts>;

interface CompiledRoute {
  method: HttpMethod;
  template: string;
  pattern: RegExp;
  names: string[];
  handler: RouteHandler;
}

export type RouteMatch =
  | { kind: 'matched'; template: string; params: RouteParams; handler: RouteHandler }
  | { kind: 'method_not_allowed'; allowed: HttpMethod[] }
  | { kind: 'not_found' };

const escapeRegExp = (value: string) => value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');

const compile = (template: string) => {
  const names: string[] = [];
  const source = template
    .split('/')
    .map((segment) => {
      if (segment.startsWith(':') && segment.length > 1) {
        names.push(segment.slice(1));
        return '([^/]+)';
      }
      return escapeRegExp(segment);
    })
    .join('/');
  return { pattern: new RegExp(`^${source}$`), names };
};

/**
 * Matches a pathname against `:name` templates. Captures are handed back as
 * raw segments, still percent-encoded, keyed by placeholder name.
 */
export class Router {
  private readonly routes: CompiledRoute[] = [];

  add(method: HttpMethod, template: string, handler: RouteHandler) {
    const { pattern, names } = compile(template);
    this.routes.push({ method, template, pattern, names, handler });
    return this;
  }

  match(method: string, pathname: string): RouteMatch {
    const allowed: HttpMethod[] = [];

    for (const route of this.routes) {
      const found = route.pattern.exec(pathname);
      if (!found) continue;

      if (route.method !== method) {
        if (!allowed.includes(route.method)) allowed.push(route.method);
        continue;
      }

      const params: RouteParams = {};
      route.names.forEach((name, index) => {
        params[name] = found[index + 1] ?? '';
      });
      return { kind: 'matched', template: route.template, params, handler: route.handler };
    }

    return allowed.length > 0 ? { kind: 'method_not_allowed', allowed } : { kind: 'not_found' };
  }
}
