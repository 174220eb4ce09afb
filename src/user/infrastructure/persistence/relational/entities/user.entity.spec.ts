import { UserEntity } from './user.entity';

describe('UserEntity', () => {
  describe('generateUlid', () => {
    it('should assign a lower-case ulid when none is set', () => {
      const user = new UserEntity();

      user.generateUlid();

      expect(user.ulid).toMatch(/^[0-9a-hjkmnp-tv-z]{26}$/);
    });

    it('should keep an existing ulid', () => {
      const user = new UserEntity();
      user.ulid = '01arz3ndektsv4rrffq69g5fav';

      user.generateUlid();

      expect(user.ulid).toBe('01arz3ndektsv4rrffq69g5fav');
    });
  });
});
