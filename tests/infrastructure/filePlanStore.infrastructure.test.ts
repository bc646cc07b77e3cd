// tests/infrastructure/filePlanStore.infrastructure.test.ts

/**
 * FilePlanStore infrastructure tests.
 *
 * Runs against a throwaway directory under the OS temp dir.
 */

import { mkdtemp, readFile, readdir, rm, writeFile } from 'fs/promises';
import os from 'os';
import path from 'path';

import type { ExperimentPlan } from '../../src/experiments/domain/ExperimentPlan';
import type { NewExperimentPlan } from '../../src/experiments/domain/PlanStore';
import { NotFoundError } from '../../src/experiments/domain/ExperimentErrors';
import {
  FilePlanStore,
  parsePlanDocument,
} from '../../src/experiments/infrastructure/FilePlanStore';

function newPlan(overrides: Partial<NewExperimentPlan> = {}): NewExperimentPlan {
  return {
    packageName: 'com.example.app',
    language: 'en-US',
    name: 'Title test',
    metric: 'cvr',
    trafficProportion: 0.5,
    type: 'text',
    variants: [
      { variantId: 'var_a', label: 'A' },
      { variantId: 'var_b', label: 'B', title: 'New title' },
    ],
    status: 'draft',
    createdAt: '2026-01-01T00:00:00.000Z',
    updatedAt: '2026-01-01T00:00:00.000Z',
    ...overrides,
  };
}

describe('FilePlanStore', () => {
  let rootDir: string;

  beforeEach(async () => {
    const tmp = await mkdtemp(path.join(os.tmpdir(), 'plan-store-'));
    // a nested directory that does not exist yet
    rootDir = path.join(tmp, 'experiments');
  });

  afterEach(async () => {
    await rm(path.dirname(rootDir), { recursive: true, force: true });
  });

  it('creates the directory and writes a pretty JSON document per plan', async () => {
    const store = new FilePlanStore(rootDir, () => 'exp_fixed');

    const plan = await store.create(newPlan());

    expect(plan.planId).toBe('exp_fixed');
    const raw = await readFile(path.join(rootDir, 'exp_fixed.json'), 'utf8');
    expect(raw).toBe(`${JSON.stringify(plan, null, 2)}\n`);
  });

  it('keeps a caller-supplied planId', async () => {
    const store = new FilePlanStore(rootDir, () => 'exp_generated');

    const plan = await store.create(newPlan({ planId: 'exp_given' }));

    expect(plan.planId).toBe('exp_given');
    expect(await readdir(rootDir)).toEqual(['exp_given.json']);
  });

  it('round-trips a plan through get', async () => {
    const store = new FilePlanStore(rootDir);

    const created = await store.create(newPlan());
    const loaded = await store.get(created.planId);

    expect(loaded).toEqual(created);
    expect(created.planId).toMatch(/^exp_[0-9a-f]{32}$/);
  });

  it('overwrites the whole document on save', async () => {
    const store = new FilePlanStore(rootDir, () => 'exp_1');
    const plan = await store.create(newPlan({ notes: 'to be removed' }));

    const { notes: _notes, ...withoutNotes } = plan;
    const updated: ExperimentPlan = { ...withoutNotes, status: 'running' };
    await store.save(updated);

    expect(await store.get('exp_1')).toEqual(updated);
  });

  it('throws NotFoundError for a missing plan', async () => {
    const store = new FilePlanStore(rootDir);

    await expect(store.get('exp_missing')).rejects.toBeInstanceOf(NotFoundError);
  });

  it('treats an unparseable document as not found', async () => {
    const store = new FilePlanStore(rootDir, () => 'exp_1');
    await store.create(newPlan());
    await writeFile(path.join(rootDir, 'exp_1.json'), '{ not json', 'utf8');

    await expect(store.get('exp_1')).rejects.toMatchObject({
      code: 'NOT_FOUND',
      message: 'Stored plan exp_1 could not be parsed',
    });
  });

  it('refuses ids that are not plain file names', async () => {
    const store = new FilePlanStore(rootDir);

    await expect(store.get('../secrets')).rejects.toBeInstanceOf(NotFoundError);
    await expect(store.delete('../secrets')).resolves.toBe(false);
    await expect(store.create(newPlan({ planId: 'a/b' }))).rejects.toThrow(
      'Invalid planId for storage: a/b',
    );
  });

  it('lists plans in file-name order and skips unreadable documents', async () => {
    const ids = ['exp_b', 'exp_a'];
    const store = new FilePlanStore(rootDir, () => ids.shift() ?? 'exp_z');
    await store.create(newPlan({ name: 'Second' }));
    await store.create(newPlan({ name: 'First' }));
    await writeFile(path.join(rootDir, 'exp_broken.json'), '[]', 'utf8');
    await writeFile(path.join(rootDir, 'README.txt'), 'ignored', 'utf8');

    const plans = await store.list();

    expect(plans.map((p) => p.planId)).toEqual(['exp_a', 'exp_b']);
    expect(plans.map((p) => p.name)).toEqual(['First', 'Second']);
  });

  it('lists nothing for a fresh directory', async () => {
    await expect(new FilePlanStore(rootDir).list()).resolves.toEqual([]);
  });

  it('reports whether delete removed a document', async () => {
    const store = new FilePlanStore(rootDir, () => 'exp_1');
    await store.create(newPlan());

    await expect(store.delete('exp_1')).resolves.toBe(true);
    await expect(store.delete('exp_1')).resolves.toBe(false);
    await expect(store.get('exp_1')).rejects.toBeInstanceOf(NotFoundError);
  });
});

describe('parsePlanDocument', () => {
  it('rejects documents missing required plan fields', () => {
    expect(parsePlanDocument('{"planId":"exp_1"}')).toBeNull();
    expect(parsePlanDocument('null')).toBeNull();
  });

  it('rejects an unknown status', () => {
    const doc = { ...newPlan(), planId: 'exp_1', status: 'paused' };
    expect(parsePlanDocument(JSON.stringify(doc))).toBeNull();
  });

  it('rejects variants without a label', () => {
    const doc = { ...newPlan(), planId: 'exp_1', variants: [{ variantId: 'var_a' }] };
    expect(parsePlanDocument(JSON.stringify(doc))).toBeNull();
  });
});
