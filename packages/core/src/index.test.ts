import { name, listFiles, runCopyhead, FileProcessor, Orchestrator } from './index';

describe('core package', () => {
  it('exports name', () => {
    expect(name).toBe('@copyhead/core');
  });

  it('exposes the run entry points', () => {
    expect(typeof runCopyhead).toBe('function');
    expect(typeof listFiles).toBe('function');
    expect(typeof FileProcessor).toBe('function');
    expect(typeof Orchestrator).toBe('function');
  });
});
