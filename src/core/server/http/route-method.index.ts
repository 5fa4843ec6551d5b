import { Injectable, OnApplicationBootstrap, RequestMethod } from '@nestjs/common';
import { METHOD_METADATA, PATH_METADATA } from '@nestjs/common/constants';
import { DiscoveryService, MetadataScanner, Reflector } from '@nestjs/core';

interface RouteEntry {
  readonly pattern: RegExp;
  readonly method: string;
}

/**
 * 路由方法索引
 *
 * 启动后扫描所有控制器的路由，用于在路由不匹配时判断
 * 是"地址不存在"还是"地址存在但请求方法不支持"
 */
@Injectable()
export class RouteMethodIndex implements OnApplicationBootstrap {
  private routes: readonly RouteEntry[] = [];

  constructor(
    private readonly discovery: DiscoveryService,
    private readonly metadataScanner: MetadataScanner,
    private readonly reflector: Reflector,
  ) {}

  onApplicationBootstrap(): void {
    const routes: RouteEntry[] = [];
    for (const wrapper of this.discovery.getControllers()) {
      const { instance, metatype } = wrapper;
      if (!instance || !metatype) {
        continue;
      }
      const controllerPaths = toPaths(this.reflector.get<unknown>(PATH_METADATA, metatype));
      const prototype: object = Object.getPrototypeOf(instance);
      for (const methodName of this.metadataScanner.getAllMethodNames(prototype)) {
        const handler: unknown = Reflect.get(prototype, methodName);
        if (typeof handler !== 'function') {
          continue;
        }
        const routePath: unknown = Reflect.getMetadata(PATH_METADATA, handler);
        if (routePath === undefined) {
          continue;
        }
        const requestMethod: unknown = Reflect.getMetadata(METHOD_METADATA, handler);
        const method =
          typeof requestMethod === 'number' ? RequestMethod[requestMethod] : RequestMethod[RequestMethod.GET];
        for (const controllerPath of controllerPaths) {
          for (const path of toPaths(routePath)) {
            routes.push({ pattern: toPattern(joinPaths(controllerPath, path)), method });
          }
        }
      }
    }
    this.routes = routes;
  }

  /**
   * 匹配 path 的路由所支持的请求方法；路径不存在时返回空数组
   */
  allowedMethods(path: string): string[] {
    const methods = new Set<string>();
    for (const route of this.routes) {
      if (route.pattern.test(path)) {
        methods.add(route.method);
      }
    }
    return [...methods];
  }
}

function toPaths(value: unknown): string[] {
  if (typeof value === 'string') {
    return [value];
  }
  if (Array.isArray(value)) {
    return value.filter((item): item is string => typeof item === 'string');
  }
  return ['/'];
}

function joinPaths(prefix: string, path: string): string {
  const segments = [prefix, path]
    .flatMap((part) => part.split('/'))
    .filter((segment) => segment.length > 0);
  return `/${segments.join('/')}`;
}

function toPattern(path: string): RegExp {
  const source = path
    .split('/')
    .map((segment) => {
      if (segment.startsWith(':')) {
        return '[^/]+';
      }
      if (segment === '*') {
        return '.*';
      }
      return segment.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
    })
    .join('/');
  return new RegExp(`^${source}/?$`);
}
