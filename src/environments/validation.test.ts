import { describe, it, expect } from 'vitest';
import { checkEnvironments } from './validation.js';
import type { EnvironmentDescriptor, EnvironmentType } from './types.js';

function env(type: EnvironmentType, name: string): EnvironmentDescriptor {
  return { type, name, path: `/envs/${type}/${name}`, status: 'available' };
}

describe('checkEnvironments', () => {
  it('reports each recorded environment once, in id order', () => {
    const check = checkEnvironments(
      [env('venv', 'b'), env('venv', 'a'), env('venv', 'a')],
      [{ type: 'venv', environments: [env('venv', 'a')], watchDirs: [] }],
      [],
    );

    expect(check).toEqual({ present: ['venv:a'], missing: ['venv:b'], unverified: [] });
  });

  it('counts environments of a manager that found nothing as missing', () => {
    const check = checkEnvironments(
      [env('conda', 'base')],
      [{ type: 'conda', environments: [], watchDirs: [] }],
      [],
    );

    expect(check.missing).toEqual(['conda:base']);
  });

  it('does not call an environment missing when its manager could not be asked', () => {
    const check = checkEnvironments(
      [env('mamba', 'ml')],
      [],
      [{ type: 'mamba', missing: true, message: 'Required tool not found: mamba' }],
    );

    expect(check).toEqual({
      present: [],
      missing: [],
      unverified: [{ type: 'mamba', ids: ['mamba:ml'], reason: 'Required tool not found: mamba' }],
    });
  });
});
