import { createRequire } from 'node:module';

export type CompiledRegex = {
  test(text: string): boolean;
  exec(text: string): RegExpExecArray | null;
};

type Re2Ctor = new (pattern: string, flags?: string) => CompiledRegex;

let cachedRe2Ctor: Re2Ctor | null | undefined;

function loadRe2Ctor(): Re2Ctor | null {
  if (cachedRe2Ctor !== undefined) return cachedRe2Ctor;
  try {
    const require = createRequire(import.meta.url);
    const mod: unknown = require('re2');
    cachedRe2Ctor = isRe2Ctor(mod) ? mod : isRe2Module(mod) ? mod.default : null;
  } catch {
    // re2 is optional; RegExp covers every pattern we build
    cachedRe2Ctor = null;
  }
  return cachedRe2Ctor;
}

function isRe2Ctor(value: unknown): value is Re2Ctor {
  return typeof value === 'function';
}

function isRe2Module(value: unknown): value is { default: Re2Ctor } {
  return typeof value === 'object' && value !== null && 'default' in value && isRe2Ctor(value.default);
}

export function compileRegex(pattern: string, flags = ''): CompiledRegex {
  const RE2 = loadRe2Ctor();
  if (RE2) return new RE2(pattern, flags);
  return new RegExp(pattern, flags);
}
