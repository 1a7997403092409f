import { describe, it, afterEach, mock } from 'node:test';
import assert from 'node:assert';
import { classifyAssignment, createSettings, Section } from '../../src/core/settings/section.ts';
import { Entry } from '../../src/core/settings/entry.ts';
import { assertThrowsSettingsError } from '../helpers/settings-helpers.ts';

function buildTree(): Section {
  const root = createSettings();
  root.addItem('x', 1, {
    setter: (slot, value) => {
      slot.set(Number(value) * 2, { raw: true });
    },
    getter: (slot) => `x=${String(slot.get({ raw: true }))}`,
  });
  root.addItem('_y', -2);
  root.addSection('Hoge').addItem('num', 0);
  root.addSection('_priv').addItem('a', 1);
  return root;
}

describe('Section accessors', () => {
  afterEach(() => {
    mock.restoreAll();
  });

  describe('filtered surface', () => {
    it('should return the stored value of a public item', () => {
      const root = buildTree();

      assert.strictEqual(root.getItem('x'), 1);
      assert.strictEqual(root.get('x'), 'x=1');
    });

    it('should return a public subsection', () => {
      const root = buildTree();

      assert.strictEqual(root.getSection('Hoge').getItem('num'), 0);
    });

    it('should not reach prefixed or undeclared names', () => {
      const root = buildTree();

      assertThrowsSettingsError(() => root.getItem('_y'), 'AttributeNotFoundError');
      assertThrowsSettingsError(() => root.getItem('missing'), 'AttributeNotFoundError');
      assertThrowsSettingsError(() => root.getItem('Hoge'), 'AttributeNotFoundError');
      assertThrowsSettingsError(() => root.getSection('_priv'), 'AttributeNotFoundError');
      assertThrowsSettingsError(() => root.getSection('x'), 'AttributeNotFoundError');
    });

    it('should store a plain value without the setter', () => {
      const root = buildTree();

      root.setItem('x', 34);

      assert.strictEqual(root.getItem('x'), 34);
    });

    it('should replace an item with an entry of the same name', () => {
      const root = buildTree();
      const replacement = new Entry(root, 'x', 99);

      root.setItem('x', replacement);

      assert.strictEqual(root.lookup('x'), replacement);
      assert.strictEqual(root.getItem('x'), 99);
    });

    it('should reject an entry with another name', () => {
      const root = buildTree();

      assertThrowsSettingsError(() => root.setItem('x', new Entry(root, 'other', 1)), 'NameMismatchError');
    });

    it('should reject writes to prefixed or undeclared names', () => {
      const root = buildTree();

      assertThrowsSettingsError(() => root.setItem('_y', 1), 'AttributeNotFoundError');
      assertThrowsSettingsError(() => root.setItem('missing', 1), 'AttributeNotFoundError');
    });

    it('should only accept a section with the same name for a section slot', () => {
      const root = buildTree();
      const replacement = new Section(root, 'Hoge');

      assertThrowsSettingsError(() => root.setItem('Hoge', 5), 'InvalidSectionValueError');
      assertThrowsSettingsError(() => root.setSection('Hoge', new Section(root, 'Other')), 'NameMismatchError');
      assertThrowsSettingsError(() => root.setSection('_priv', new Section(root, '_priv')), 'AttributeNotFoundError');

      root.setSection('Hoge', replacement);
      assert.strictEqual(root.getSection('Hoge'), replacement);
    });
  });

  describe('raw surface', () => {
    it('should reach hidden entries and sections', () => {
      const root = buildTree();

      const hidden = root.lookup('_y');
      assert.ok(hidden instanceof Entry);
      assert.strictEqual(hidden.get(), -2);
      assert.ok(root.lookup('_priv') instanceof Section);
      assertThrowsSettingsError(() => root.lookup('missing'), 'EntryNotFoundError');
    });

    it('should report size and membership', () => {
      const root = buildTree();

      assert.strictEqual(root.size, 4);
      assert.strictEqual(root.has('_y'), true);
      assert.strictEqual(root.has('Hoge'), true);
      assert.strictEqual(root.has('missing'), false);
      assert.deepStrictEqual([...root.allEntries.keys()], ['x', '_y', 'Hoge', '_priv']);
      assert.deepStrictEqual([...root.publicEntries.keys()], ['x', 'Hoge']);
      assert.deepStrictEqual([...root.publicItems.keys()], ['x']);
      assert.deepStrictEqual([...root.publicSections.keys()], ['Hoge']);
    });

    it('should update an existing item with a plain value', () => {
      const root = buildTree();

      root.assign('_y', 7);

      assert.strictEqual(root.get('_y'), 7);
    });

    it('should add a new item for a plain value', () => {
      const root = buildTree();

      root.assign('added', 3);

      assert.strictEqual(root.get('added'), 3);
    });

    it('should register a new entry under its own name', () => {
      const warn = mock.method(console, 'warn', () => {});
      const root = buildTree();

      root.assign('key', new Entry(root, 'actual', 5));

      assert.strictEqual(root.get('actual'), 5);
      assert.strictEqual(root.has('key'), false);
      assert.deepStrictEqual(warn.mock.calls[0]?.arguments, ["⚠️  'key' will be replaced to 'actual'."]);
    });

    it('should register a new section under its own name', () => {
      const warn = mock.method(console, 'warn', () => {});
      const root = buildTree();
      const section = new Section(root, 'Named');

      root.assign('Other', section);

      assert.strictEqual(root.lookup('Named'), section);
      assert.strictEqual(warn.mock.callCount(), 1);
    });

    it('should reject a new section whose own name is taken', () => {
      const warn = mock.method(console, 'warn', () => {});
      const root = buildTree();

      assertThrowsSettingsError(() => root.assign('fresh', new Section(root, 'x')), 'DuplicateNameError');
      assert.strictEqual(warn.mock.callCount(), 1);
    });

    it('should reject plain values and sections in the wrong slot', () => {
      const root = buildTree();

      assertThrowsSettingsError(() => root.assign('Hoge', 1), 'InvalidSectionValueError');
      assertThrowsSettingsError(() => root.assign('x', new Section(root, 'x')), 'DuplicateNameError');
    });
  });

  describe('classifyAssignment', () => {
    it('should tag entries, sections and plain values', () => {
      const root = createSettings();
      const entry = root.addItem('a', 1);
      const section = root.addSection('S');

      assert.deepStrictEqual(classifyAssignment(entry), { kind: 'entry', entry });
      assert.deepStrictEqual(classifyAssignment(section), { kind: 'section', section });
      assert.deepStrictEqual(classifyAssignment([1]), { kind: 'value', value: [1] });
    });
  });
});
