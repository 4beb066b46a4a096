import { describe, it, expect } from 'vitest';
import { parseYesNo, validateServerInput, type NewServerInput } from './prompts.js';

function values(input: Partial<NewServerInput>) {
  const entry: NewServerInput = {
    name: 'home',
    url: 'jf.lan:8096',
    username: 'listener',
    password: 'test-secret',
    save: true,
    ...input,
  };
  return new Map<keyof NewServerInput, string>([
    ['name', entry.name],
    ['url', entry.url],
    ['username', entry.username],
    ['password', entry.password],
    ['save', entry.save ? 'y' : 'n'],
  ]);
}

describe('validateServerInput', () => {
  it('should accept a complete entry', () => {
    expect(validateServerInput(values({}))).toBeNull();
  });

  it('should require a name', () => {
    expect(validateServerInput(values({ name: '' }))).toEqual({ message: 'Name is required', field: 'name' });
  });

  it('should limit the name length', () => {
    expect(validateServerInput(values({ name: 'x'.repeat(65) }))?.field).toBe('name');
  });

  it('should reject an unusable URL', () => {
    expect(validateServerInput(values({ url: '' }))).toEqual({ message: 'Server URL is required', field: 'url' });
    expect(validateServerInput(values({ url: 'http://bad host' }))).toEqual({ message: 'Server URL is not valid', field: 'url' });
  });

  it('should require username and password', () => {
    expect(validateServerInput(values({ username: '' }))?.field).toBe('username');
    expect(validateServerInput(values({ password: '' }))?.field).toBe('password');
  });
});

describe('parseYesNo', () => {
  it('should read yes and no answers', () => {
    expect(parseYesNo(' Y ')).toBe(true);
    expect(parseYesNo('yes')).toBe(true);
    expect(parseYesNo('n')).toBe(false);
    expect(parseYesNo('')).toBe(false);
  });

  it('should reject anything else', () => {
    expect(parseYesNo('maybe')).toBeNull();
  });
});

describe('validateServerInput save answer', () => {
  it('should reject an unclear save answer', () => {
    const input = values({});
    input.set('save', 'later');
    expect(validateServerInput(input)).toEqual({ message: 'Answer y or n', field: 'save' });
  });
});
