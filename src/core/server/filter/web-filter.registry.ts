import { Logger } from '@nestjs/common';
import type { Response } from 'express';
import type { HttpRequest } from '../http/http-request';
import { WEB_FILTER_DEPENDENCIES } from './web-filter-order';
import { FilterChain, WebFilter } from './web-filter';

/**
 * 过滤器链执行完毕后的终点（进入框架路由）
 */
export type FilterChainTerminal = (request: HttpRequest, response: Response) => Promise<void>;

interface Registration {
  readonly filter: WebFilter;
  readonly index: number;
}

/**
 * 过滤器注册表
 *
 * 按 order 升序、相同 order 按注册顺序排列，构成全局唯一的过滤器执行顺序
 */
export class WebFilterRegistry {
  private readonly logger = new Logger(WebFilterRegistry.name);
  private readonly registrations: Registration[] = [];
  private ordered: readonly WebFilter[] = [];

  register(filter: WebFilter): this {
    if (this.registrations.some((r) => r.filter.name === filter.name)) {
      throw new Error(`过滤器 ${filter.name} 重复注册`);
    }
    this.registrations.push({ filter, index: this.registrations.length });
    this.ordered = [...this.registrations]
      .sort((a, b) => a.filter.order - b.filter.order || a.index - b.index)
      .map((r) => r.filter);
    return this;
  }

  getFilters(): readonly WebFilter[] {
    return this.ordered;
  }

  /**
   * 校验已注册过滤器满足先后依赖
   *
   * @throws Error 存在违反依赖的过滤器顺序
   */
  assertDependencies(
    dependencies: ReadonlyArray<readonly [string, string]> = WEB_FILTER_DEPENDENCIES,
  ): this {
    const position = new Map(this.ordered.map((filter, index) => [filter.name, index] as const));
    const violations = dependencies
      .filter(([before, after]) => {
        const beforeIndex = position.get(before);
        const afterIndex = position.get(after);
        return beforeIndex !== undefined && afterIndex !== undefined && beforeIndex >= afterIndex;
      })
      .map(([before, after]) => `${before} 必须在 ${after} 之前执行`);

    if (violations.length > 0) {
      throw new Error(`过滤器顺序错误：\n${violations.map((v) => `  - ${v}`).join('\n')}`);
    }

    this.logger.log(
      `过滤器链: ${this.ordered.map((f) => `${f.name}(${f.order})`).join(' -> ') || '(空)'}`,
    );
    return this;
  }

  /**
   * 按顺序执行过滤器，全部放行后调用 terminal
   */
  execute(request: HttpRequest, response: Response, terminal: FilterChainTerminal): Promise<void> {
    return new VirtualFilterChain(this.ordered, terminal).doFilter(request, response);
  }
}

class VirtualFilterChain implements FilterChain {
  private position = 0;

  constructor(
    private readonly filters: readonly WebFilter[],
    private readonly terminal: FilterChainTerminal,
  ) {}

  async doFilter(request: HttpRequest, response: Response): Promise<void> {
    request.context.request = request;
    if (this.position >= this.filters.length) {
      return this.terminal(request, response);
    }
    const filter = this.filters[this.position++];
    return filter.doFilter(request, response, this);
  }
}
