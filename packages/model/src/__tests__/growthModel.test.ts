import assert from "node:assert/strict";
import test from "node:test";
import { createGrowthModel } from "../model/growthModel.js";

test("new model starts with capacity 1 and nothing pending", () => {
  const model = createGrowthModel({ growthFactor: 2 });
  assert.deepEqual(model.snapshot(), {
    growthFactor: 2,
    capacity: 1,
    size: 0,
    oldGenerationSize: 0,
    migrated: 0,
    hardLimit: null,
    resizeCount: 0,
    migrationOpCount: 0,
    efficiency: 0,
  });
  assert.equal(model.isMigrationComplete(), true);
});

test("tryGrow admits until capacity is exhausted and then fails without mutation", () => {
  const model = createGrowthModel({ growthFactor: 2 });
  assert.deepEqual(model.tryGrow(), { ok: true, value: 1 });

  const before = model.snapshot();
  assert.deepEqual(model.tryGrow(), { ok: false });
  assert.deepEqual(model.snapshot(), before);
});

test("expand starts a new generation and multiplies capacity with ceil", () => {
  const model = createGrowthModel({ growthFactor: 1.5 });
  model.tryGrow();
  model.expand();

  const snap = model.snapshot();
  assert.equal(snap.capacity, 2);
  assert.equal(snap.oldGenerationSize, 1);
  assert.equal(snap.migrated, 0);
  assert.equal(snap.resizeCount, 1);

  model.tryGrow();
  model.expand();
  assert.equal(model.snapshot().capacity, 3);
  assert.equal(model.snapshot().oldGenerationSize, 2);
});

test("expand clamps capacity to the hard limit", () => {
  const model = createGrowthModel({ growthFactor: 10, hardLimit: 4 });
  model.tryGrow();
  model.expand();
  assert.equal(model.snapshot().capacity, 4);

  model.expand();
  assert.equal(model.snapshot().capacity, 4);
  assert.equal(model.snapshot().resizeCount, 2);
});

test("expand never shrinks capacity for a factor below 1", () => {
  const model = createGrowthModel({ growthFactor: 0.5 });
  model.tryGrow();
  model.expand();
  assert.equal(model.snapshot().capacity, 1);
  assert.deepEqual(model.tryGrow(), { ok: false });
});

test("expand resets migration progress", () => {
  const model = createGrowthModel({ growthFactor: 2 });
  model.tryGrow();
  model.expand();
  model.tryGrow();
  model.expand();
  assert.deepEqual(model.migrateOne(), { ok: true, value: 1 });

  model.tryGrow();
  model.tryGrow();
  model.expand();
  assert.equal(model.snapshot().migrated, 0);
  assert.equal(model.snapshot().oldGenerationSize, 4);
});

test("migrateOne advances one unit and is idempotent at exhaustion", () => {
  const model = createGrowthModel({ growthFactor: 2 });
  model.tryGrow();
  model.expand();
  model.tryGrow();
  model.expand();

  assert.deepEqual(model.migrateOne(), { ok: true, value: 1 });
  assert.deepEqual(model.migrateOne(), { ok: true, value: 2 });
  assert.equal(model.isMigrationComplete(), true);

  const settled = model.snapshot();
  for (let i = 0; i < 25; i++) {
    assert.deepEqual(model.migrateOne(), { ok: false });
  }
  assert.deepEqual(model.snapshot(), settled);
  assert.equal(settled.migrationOpCount, 2);
});

test("efficiency counts fresh and migrated elements the same way", () => {
  const build = () => {
    const model = createGrowthModel({ growthFactor: 2 });
    model.tryGrow();
    model.expand();
    model.tryGrow();
    model.expand();
    return model;
  };

  // oldGenerationSize = 2, size = 2, migrated = 0, capacity = 4
  const afterExpand = build();
  assert.equal(afterExpand.efficiency(), 0);

  const afterGrow = build();
  afterGrow.tryGrow();
  assert.equal(afterGrow.efficiency(), 1 / 4);

  const afterMigrate = build();
  afterMigrate.migrateOne();
  assert.equal(afterMigrate.efficiency(), 1 / 4);
  assert.equal(afterMigrate.snapshot().efficiency, 1 / 4);
});

test("snapshots are frozen copies", () => {
  const model = createGrowthModel({ growthFactor: 2, hardLimit: 8 });
  const snap = model.snapshot();
  model.tryGrow();

  assert.equal(Object.isFrozen(snap), true);
  assert.equal(snap.size, 0);
  assert.equal(snap.hardLimit, 8);
});
