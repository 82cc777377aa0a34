import { Injectable } from '@nestjs/common';
import { AsyncLocalStorage } from 'node:async_hooks';
import { LogContext } from '../../../application/ports/logger.port';

export interface RenderContextStore extends LogContext {
  renderId?: string;
  outputName?: string;
  compiler?: string;
}

@Injectable()
export class RenderContextService {
  private readonly storage = new AsyncLocalStorage<RenderContextStore>();

  async runWithAsync<T>(store: RenderContextStore, callback: () => Promise<T>): Promise<T> {
    return this.storage.run(store, callback);
  }

  set<K extends keyof RenderContextStore>(key: K, value: RenderContextStore[K]): void {
    const store = this.storage.getStore();
    if (store) {
      store[key] = value;
    }
  }

  get<K extends keyof RenderContextStore>(key: K): RenderContextStore[K] | undefined {
    return this.storage.getStore()?.[key];
  }

  getStore(): RenderContextStore | undefined {
    return this.storage.getStore();
  }

  getRenderId(): string | undefined {
    return this.get('renderId');
  }
}
