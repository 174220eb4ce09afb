import { NotFoundException, UnprocessableEntityException } from '@nestjs/common';
import { Test, TestingModule } from '@nestjs/testing';
import { getRepositoryToken } from '@nestjs/typeorm';
import bcrypt from 'bcryptjs';
import { EntityManager, QueryFailedError } from 'typeorm';
import { UserEntity } from './infrastructure/persistence/relational/entities/user.entity';
import { UserService } from './user.service';

const duplicateEmail = () =>
  new QueryFailedError(
    'INSERT INTO "users"',
    [],
    Object.assign(new Error('duplicate key value'), { code: '23505' }),
  );

describe('UserService', () => {
  let service: UserService;
  const usersRepository = {
    create: jest.fn((data: Partial<UserEntity>) => ({ ...data })),
    save: jest.fn((user: Partial<UserEntity>) =>
      Promise.resolve({ id: 1, ...user }),
    ),
    findOne: jest.fn(),
    softDelete: jest.fn(),
  };

  beforeEach(async () => {
    jest.clearAllMocks();
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        UserService,
        {
          provide: getRepositoryToken(UserEntity),
          useValue: usersRepository,
        },
      ],
    }).compile();

    service = module.get<UserService>(UserService);
  });

  describe('create', () => {
    it('should store a lower-cased email and a bcrypt hash of the password', async () => {
      usersRepository.findOne.mockResolvedValue(null);

      const user = await service.create({
        email: '  Jane@Example.COM ',
        password: 'Passw0rdA',
      });

      expect(user.email).toBe('jane@example.com');
      expect(user.isVerified).toBe(false);
      expect(user.password).not.toBe('Passw0rdA');
      expect(await bcrypt.compare('Passw0rdA', user.password)).toBe(true);
    });

    it('should reject an email that is already registered, including disabled accounts', async () => {
      usersRepository.findOne.mockResolvedValue({ id: 7, email: 'jane@example.com' });

      const error = await service
        .create({ email: 'jane@example.com', password: 'Passw0rdA' })
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(UnprocessableEntityException);
      expect((error as UnprocessableEntityException).getResponse()).toEqual({
        status: 422,
        errors: { email: 'emailAlreadyExists' },
      });
      expect(usersRepository.findOne).toHaveBeenCalledWith({
        where: { email: 'jane@example.com' },
        withDeleted: true,
      });
      expect(usersRepository.save).not.toHaveBeenCalled();
    });

    it('should answer a registration that lost the race for the address with 422', async () => {
      usersRepository.findOne.mockResolvedValue(null);
      usersRepository.save.mockRejectedValueOnce(duplicateEmail());

      await expect(
        service.create({ email: 'jane@example.com', password: 'Passw0rdA' }),
      ).rejects.toMatchObject({
        response: { status: 422, errors: { email: 'emailAlreadyExists' } },
      });
    });

    it('should rethrow other database errors', async () => {
      usersRepository.findOne.mockResolvedValue(null);
      usersRepository.save.mockRejectedValueOnce(new Error('connection reset'));

      await expect(
        service.create({ email: 'jane@example.com', password: 'Passw0rdA' }),
      ).rejects.toThrow('connection reset');
    });
  });

  describe('changeEmail', () => {
    it('should reject the current address', async () => {
      usersRepository.findOne.mockResolvedValueOnce({
        id: 1,
        email: 'jane@example.com',
        isVerified: true,
      });

      const error = await service
        .changeEmail(1, 'JANE@example.com')
        .catch((e: unknown) => e);

      expect((error as UnprocessableEntityException).getResponse()).toEqual({
        status: 422,
        errors: { email: 'emailUnchanged' },
      });
    });

    it('should switch the address and mark the account unverified', async () => {
      usersRepository.findOne
        .mockResolvedValueOnce({ id: 1, email: 'jane@example.com', isVerified: true })
        .mockResolvedValueOnce(null);

      const user = await service.changeEmail(1, 'jane.doe@example.com');

      expect(user).toEqual({
        id: 1,
        email: 'jane.doe@example.com',
        isVerified: false,
      });
    });

    it('should answer a change that lost the race for the address with 422', async () => {
      usersRepository.findOne
        .mockResolvedValueOnce({ id: 1, email: 'jane@example.com', isVerified: true })
        .mockResolvedValueOnce(null);
      usersRepository.save.mockRejectedValueOnce(duplicateEmail());

      await expect(
        service.changeEmail(1, 'jane.doe@example.com'),
      ).rejects.toMatchObject({
        response: { errors: { email: 'emailAlreadyExists' } },
      });
    });

    it('should save through the transaction manager it is given', async () => {
      const txRepository = {
        findOne: jest
          .fn()
          .mockResolvedValue({ id: 1, email: 'jane@example.com', isVerified: true }),
        save: jest.fn((user: Partial<UserEntity>) => Promise.resolve(user)),
      };
      const manager = {
        getRepository: jest.fn(() => txRepository),
      } as unknown as EntityManager;
      usersRepository.findOne.mockResolvedValue(null);

      await service.changeEmail(1, 'jane.doe@example.com', manager);

      expect(txRepository.save).toHaveBeenCalledWith({
        id: 1,
        email: 'jane.doe@example.com',
        isVerified: false,
      });
      expect(usersRepository.save).not.toHaveBeenCalled();
    });
  });

  it('should throw NotFoundException for an unknown id', async () => {
    usersRepository.findOne.mockResolvedValue(null);

    await expect(service.getById(404)).rejects.toBeInstanceOf(NotFoundException);
  });

  it('should soft-delete on remove', async () => {
    await service.remove(3);

    expect(usersRepository.softDelete).toHaveBeenCalledWith({ id: 3 });
  });
});
