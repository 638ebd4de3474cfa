import { describe, expect, it } from 'vitest';
import * as api from './index.js';

describe('public exports', () => {
  it('exposes core classes', () => {
    expect(api.Collection).toBeDefined();
    expect(api.XmlManifestStore).toBeDefined();
    expect(api.DefaultChecker).toBeDefined();
    expect(api.DefaultUpdater).toBeDefined();
    expect(api.RuleLoader).toBeDefined();
    expect(api.DefaultRuleApplier).toBeDefined();
    expect(api.DependencyResolver).toBeDefined();
    expect(api.SqliteVerifyState).toBeDefined();
    expect(api.StatusWriter).toBeDefined();
    expect(api.runCli).toBeDefined();
  });
});
