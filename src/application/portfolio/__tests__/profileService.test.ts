import { describe, it, expect, beforeEach } from 'vitest';
import { ValidationError } from '../../../domain/errors.js';
import { ProfileAlreadyExistsError, ProfileNotFoundError } from '../../errors.js';
import { createTestContext, type TestContext } from '../../../test/fakes.js';

describe('ProfileService', () => {
  let ctx: TestContext;
  let userId: number;

  beforeEach(async () => {
    ctx = createTestContext();
    const user = await ctx.services.register.execute({
      username: 'alice',
      email: 'alice@example.com',
      password: 'password123',
    });
    userId = user.id;
  });

  it('should create a profile owned by the caller', async () => {
    const profile = await ctx.services.profiles.createProfile(userId, {
      name: '  alice ',
      lastName: 'SMITH',
      email: 'Alice@Example.com',
      bioSummary: 'Backend developer',
    });

    expect(profile.userId).toBe(userId);
    expect(profile.name).toBe('Alice');
    expect(profile.lastName).toBe('Smith');
    expect(profile.email).toBe('alice@example.com');
    expect(profile.bioSummary).toBe('Backend developer');
    expect(profile.phone).toBeNull();
    expect(profile.createdBy).toBe(userId);
    expect(profile.isActive).toBe(true);
  });

  it('should reject a second profile for the same user', async () => {
    await ctx.services.profiles.createProfile(userId, {
      name: 'Alice',
      lastName: 'Smith',
      email: 'alice@example.com',
    });

    await expect(
      ctx.services.profiles.createProfile(userId, {
        name: 'Other',
        lastName: 'Name',
        email: 'other@example.com',
      })
    ).rejects.toThrow(ProfileAlreadyExistsError);
  });

  it('should not persist an invalid profile', async () => {
    await expect(
      ctx.services.profiles.createProfile(userId, {
        name: 'Alice',
        lastName: 'Smith',
        email: 'alice@example.com',
        bioSummary: 'x'.repeat(501),
      })
    ).rejects.toThrow(ValidationError);

    expect(await ctx.repos.profiles.findByUserId(userId)).toBeNull();
  });

  it('should report a missing profile', async () => {
    await expect(ctx.services.profiles.getMyProfile(userId)).rejects.toThrow(ProfileNotFoundError);
    await expect(ctx.services.profiles.updateMyProfile(userId, {})).rejects.toThrow(
      ProfileNotFoundError
    );
  });

  it('should patch only the provided fields and stamp audit columns', async () => {
    const created = await ctx.services.profiles.createProfile(userId, {
      name: 'Alice',
      lastName: 'Smith',
      email: 'alice@example.com',
      phone: '555-0100',
      location: 'Lisbon',
    });

    const updated = await ctx.services.profiles.updateMyProfile(userId, {
      currentTitle: 'Staff Engineer',
      phone: null,
    });

    expect(updated.id).toBe(created.id);
    expect(updated.currentTitle).toBe('Staff Engineer');
    expect(updated.phone).toBeNull();
    expect(updated.location).toBe('Lisbon');
    expect(updated.name).toBe('Alice');
    expect(updated.updatedBy).toBe(userId);
    expect(updated.updatedAt).toBeInstanceOf(Date);
  });
});
