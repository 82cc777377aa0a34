import { RenderContextService } from './render-context.service';

describe('RenderContextService', () => {
  let service: RenderContextService;

  beforeEach(() => {
    service = new RenderContextService();
  });

  it('should expose the store only inside the run', async () => {
    const inside = await service.runWithAsync({ renderId: 'r-1' }, async () =>
      service.getRenderId(),
    );

    expect(inside).toBe('r-1');
    expect(service.getRenderId()).toBeUndefined();
  });

  it('should keep the store across awaits', async () => {
    const seen = await service.runWithAsync({ renderId: 'r-2' }, async () => {
      await new Promise((resolve) => setTimeout(resolve, 5));
      return service.getRenderId();
    });

    expect(seen).toBe('r-2');
  });

  it('should set values on the active store', async () => {
    const store = await service.runWithAsync({ renderId: 'r-3' }, async () => {
      service.set('compiler', 'xelatex');
      return service.getStore();
    });

    expect(store).toEqual({ renderId: 'r-3', compiler: 'xelatex' });
  });

  it('should ignore writes outside a run', () => {
    service.set('compiler', 'xelatex');
    expect(service.get('compiler')).toBeUndefined();
  });

  it('should isolate concurrent runs', async () => {
    const [a, b] = await Promise.all([
      service.runWithAsync({ renderId: 'a' }, async () => {
        await new Promise((resolve) => setTimeout(resolve, 10));
        return service.getRenderId();
      }),
      service.runWithAsync({ renderId: 'b' }, async () => service.getRenderId()),
    ]);

    expect([a, b]).toEqual(['a', 'b']);
  });
});
