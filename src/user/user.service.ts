import {
  HttpStatus,
  Injectable,
  Logger,
  NotFoundException,
  UnprocessableEntityException,
} from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { EntityManager, Repository } from 'typeorm';
import bcrypt from 'bcryptjs';
import { UserEntity } from './infrastructure/persistence/relational/entities/user.entity';
import { NullableType } from '../utils/types/nullable.type';
import { isUniqueViolation } from '../utils/database-errors';

export function normalizeEmail(email: string): string {
  return email.trim().toLowerCase();
}

function emailTaken(): UnprocessableEntityException {
  return new UnprocessableEntityException({
    status: HttpStatus.UNPROCESSABLE_ENTITY,
    errors: { email: 'emailAlreadyExists' },
  });
}

export async function hashPassword(password: string): Promise<string> {
  const salt = await bcrypt.genSalt();
  return bcrypt.hash(password, salt);
}

@Injectable()
export class UserService {
  private readonly logger = new Logger(UserService.name);

  constructor(
    @InjectRepository(UserEntity)
    private readonly usersRepository: Repository<UserEntity>,
  ) {}

  async create(data: { email: string; password: string }): Promise<UserEntity> {
    const email = normalizeEmail(data.email);
    await this.assertEmailAvailable(email);

    const user = this.usersRepository.create({
      email,
      password: await hashPassword(data.password),
      isVerified: false,
    });
    const saved = await this.saveUnique(this.usersRepository, user);
    this.logger.log(`Created user ${saved.id}`);
    return saved;
  }

  findById(id: number): Promise<NullableType<UserEntity>> {
    return this.usersRepository.findOne({ where: { id } });
  }

  async getById(id: number): Promise<UserEntity> {
    const user = await this.findById(id);
    if (!user) {
      throw new NotFoundException('User not found');
    }
    return user;
  }

  findByEmail(email: string): Promise<NullableType<UserEntity>> {
    return this.usersRepository.findOne({
      where: { email: normalizeEmail(email) },
    });
  }

  /**
   * Moves the account to a new address. The new address is unverified until
   * its own verification token is consumed. Pass `manager` to make the change
   * part of the caller's transaction.
   */
  async changeEmail(
    id: number,
    newEmail: string,
    manager?: EntityManager,
  ): Promise<UserEntity> {
    const repository = manager
      ? manager.getRepository(UserEntity)
      : this.usersRepository;
    const user = await repository.findOne({ where: { id } });
    if (!user) {
      throw new NotFoundException('User not found');
    }
    const email = normalizeEmail(newEmail);

    if (email === user.email) {
      throw new UnprocessableEntityException({
        status: HttpStatus.UNPROCESSABLE_ENTITY,
        errors: { email: 'emailUnchanged' },
      });
    }
    await this.assertEmailAvailable(email);

    user.email = email;
    user.isVerified = false;
    return this.saveUnique(repository, user);
  }

  async updatePassword(id: number, password: string): Promise<void> {
    await this.usersRepository.update(
      { id },
      { password: await hashPassword(password) },
    );
  }

  async remove(id: number): Promise<void> {
    await this.usersRepository.softDelete({ id });
    this.logger.log(`Disabled user ${id}`);
  }

  private async assertEmailAvailable(email: string): Promise<void> {
    const existing = await this.usersRepository.findOne({
      where: { email },
      withDeleted: true,
    });
    if (existing) {
      throw emailTaken();
    }
  }

  /** A concurrent claim of the same address surfaces as the same 422. */
  private async saveUnique(
    repository: Repository<UserEntity>,
    user: UserEntity,
  ): Promise<UserEntity> {
    try {
      return await repository.save(user);
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw emailTaken();
      }
      throw error;
    }
  }
}
