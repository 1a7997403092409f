import { describe, it } from 'node:test';
import assert from 'node:assert';
import { createSettings } from '../../src/core/settings/section.ts';
import { HandlerEntry } from '../../src/core/settings/entry.ts';
import { createRecordEnvironment } from '../../src/adapters/environment/environment.ts';
import { assertThrowsSettingsError } from '../helpers/settings-helpers.ts';

describe('HandlerEntry', () => {
  it('should require at least one binding', () => {
    const root = createSettings();
    const dest = root.addItem('num', 0);

    assertThrowsSettingsError(() => new HandlerEntry(root, dest, {}), 'MissingBindingError');
    assertThrowsSettingsError(() => new HandlerEntry(root, dest, { help: 'only metadata' }), 'MissingBindingError');
  });

  it('should have no name and be hidden', () => {
    const root = createSettings();
    const handler = new HandlerEntry(root, root.addItem('num', 0), { envvar: 'NUM' });

    assert.strictEqual(handler.name, null);
    assert.strictEqual(handler.hidden, true);
  });

  it('should forward writes and reads to the delegate', () => {
    const root = createSettings();
    const dest = root.addItem('num', 0);
    const handler = new HandlerEntry(root, dest, { argvar: '--alias' });

    assert.strictEqual(handler.set(5), 5);
    assert.strictEqual(dest.get(), 5);
    assert.strictEqual(handler.get(), 5);
  });

  it('should apply its own setter to the delegate', () => {
    const root = createSettings();
    const dest = root.addItem('num', 0);
    const handler = new HandlerEntry(root, dest, {
      setter: (slot, value) => {
        slot.set(Number(value) * 2, { raw: true });
      },
    });

    assert.strictEqual(handler.set(3), 6);
    assert.strictEqual(dest.get(), 6);
    handler.set(4, { raw: true });
    assert.strictEqual(dest.get(), 4);
  });

  it('should use the delegate getter unless it has its own', () => {
    const root = createSettings();
    const dest = root.addItem('num', 2, { getter: (slot) => Number(slot.get({ raw: true })) + 1 });
    const plain = new HandlerEntry(root, dest, { envvar: 'A' });
    const own = new HandlerEntry(root, dest, { envvar: 'B', getter: (slot) => `value=${String(slot.get())}` });

    assert.strictEqual(plain.get(), 3);
    assert.strictEqual(plain.get({ raw: true }), 2);
    assert.strictEqual(own.get(), 'value=3');
  });

  it('should write environment values into the delegate', () => {
    const root = createSettings();
    const dest = root.addItem('num', 0, { envvar: 'PRIMARY' });
    root.addHandler(dest, { envvar: 'SECONDARY', type: Number });

    root.fromEnv(createRecordEnvironment({ SECONDARY: '9' }));

    assert.strictEqual(dest.get(), 9);
  });

  it('should send further bindings to the delegate', () => {
    const root = createSettings();
    const dest = root.addItem('num', 0, { argvar: '--num' });
    const handler = new HandlerEntry(root, dest, { argvar: '--alias' });

    assert.strictEqual(handler.addHandler({ envvar: 'NUM' }), dest);
    assert.strictEqual(dest.envName, 'NUM');
    assert.strictEqual(handler.envName, null);
  });
});
