import { describe, it, expect } from 'vitest';
import { readRegistrationForm, validateRegistration } from '../src/validation/accountValidator';

describe('validateRegistration', () => {
  it('defaults the role to staff', () => {
    const result = validateRegistration(
      readRegistrationForm({ username: ' bob ', password: 'secret1', confirm: 'secret1' })
    );
    expect(result).toEqual({ ok: true, data: { username: 'bob', password: 'secret1', role: 'staff' } });
  });

  it('accepts the admin role', () => {
    const result = validateRegistration(
      readRegistrationForm({ username: 'carol', password: 'secret1', confirm: 'secret1', role: 'admin' })
    );
    expect(result.ok && result.data.role).toBe('admin');
  });

  it('reports missing username, short password and mismatch together', () => {
    const result = validateRegistration(readRegistrationForm({ username: '', password: 'abc', confirm: 'abd' }));
    expect(result.ok ? [] : result.errors).toEqual([
      'Username is required.',
      'Password must be at least 6 characters.',
      'Passwords do not match.',
    ]);
  });

  it('does not trim passwords', () => {
    const result = validateRegistration(readRegistrationForm({ username: 'dan', password: 'secret1 ', confirm: 'secret1' }));
    expect(result.ok ? [] : result.errors).toEqual(['Passwords do not match.']);
  });

  it('rejects unknown roles', () => {
    const result = validateRegistration(
      readRegistrationForm({ username: 'erin', password: 'secret1', confirm: 'secret1', role: 'owner' })
    );
    expect(result.ok ? [] : result.errors).toEqual(['Role must be admin or staff.']);
  });
});
