import { vi, describe, it, expect, beforeEach } from 'vitest';

const mockIntro = vi.fn();
const mockOutro = vi.fn();
vi.mock('@clack/prompts', () => ({
  intro: mockIntro,
  outro: mockOutro,
}));

const { showBanner, showContext, showOutro } = await import('../../../src/ui/banner.js');

describe('banner', () => {
  let logSpy: ReturnType<typeof vi.spyOn>;

  beforeEach(() => {
    vi.clearAllMocks();
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  it('shows the name and version in the intro', () => {
    showBanner('1.2.3');

    expect(mockIntro).toHaveBeenCalledTimes(1);
    const arg = String(mockIntro.mock.calls[0][0]);
    expect(arg).toContain('tagwatch');
    expect(arg).toContain('v1.2.3');
  });

  it('lists the manifest and the number of image references', () => {
    showContext({ manifestPath: '/app/docker-compose.yml', kind: 'compose', images: 4 });

    const output = String(logSpy.mock.calls[0][0]);
    expect(output).toContain('Compose: /app/docker-compose.yml');
    expect(output).toContain('Image references: 4');
  });

  it('passes the message to outro', () => {
    showOutro('Done');

    expect(mockOutro).toHaveBeenCalledTimes(1);
    expect(String(mockOutro.mock.calls[0][0])).toContain('Done');
  });
});
