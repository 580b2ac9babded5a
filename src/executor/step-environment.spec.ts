import { interpolateEnv } from './step-environment';

describe('interpolateEnv', () => {
  it('substitutes defined variables', () => {
    const env = { PROFILE: '--release', TARGET: 'x86_64' };
    expect(interpolateEnv('cargo build ${{ env.PROFILE }} --target=${{env.TARGET}}', env)).toBe(
      'cargo build --release --target=x86_64',
    );
  });

  it('replaces unknown names with an empty string', () => {
    expect(interpolateEnv('echo [${{ env.MISSING }}]', {})).toBe('echo []');
  });

  it('does not read inherited object properties', () => {
    expect(interpolateEnv('echo ${{ env.constructor }}/${{ env.toString }}', { CI: 'true' })).toBe(
      'echo /',
    );
  });
});
