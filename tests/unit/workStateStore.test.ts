import test from "node:test";
import assert from "node:assert/strict";
import { WorkStateStore } from "../../src/tracker/store.ts";

test("starts with every flag off and no entry", () => {
  const store = new WorkStateStore();
  assert.deepEqual(store.snapshot(), { atWork: false, onLaptop: false, onPhone: false });
  assert.equal(store.lastEntry(), null);
});

test("set updates only the signalled field", () => {
  const store = new WorkStateStore();
  assert.deepEqual(store.set("on_laptop", true), {
    atWork: false,
    onLaptop: true,
    onPhone: false,
  });
  assert.deepEqual(store.set("at_work", true), {
    atWork: true,
    onLaptop: true,
    onPhone: false,
  });
  assert.deepEqual(store.set("on_laptop", false), {
    atWork: true,
    onLaptop: false,
    onPhone: false,
  });
});

test("snapshots are copies", () => {
  const store = new WorkStateStore();
  const snap = store.set("on_phone", true);
  snap.onPhone = false;
  assert.equal(store.snapshot().onPhone, true);
});

test("rememberEntry overwrites the previous entry", () => {
  const store = new WorkStateStore();
  store.rememberEntry({ id: "entry-1", userId: "user-1" });
  store.rememberEntry({ id: "entry-2", userId: "user-1" });
  assert.deepEqual(store.lastEntry(), { id: "entry-2", userId: "user-1" });
});
