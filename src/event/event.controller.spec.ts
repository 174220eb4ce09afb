import { ConflictException, NotFoundException } from '@nestjs/common';
import { Test, TestingModule } from '@nestjs/testing';
import { JWTAuthGuard } from '../auth/auth.guard';
import {
  JoinOutcome,
  WithdrawOutcome,
} from '../event-participant/domain/participation';
import { EventController } from './event.controller';
import { EventService } from './event.service';

describe('EventController', () => {
  let controller: EventController;
  const mockEventService = {
    findAll: jest.fn(),
    findBySlug: jest.fn(),
    create: jest.fn(),
    update: jest.fn(),
    remove: jest.fn(),
    join: jest.fn(),
    withdraw: jest.fn(),
  };
  const user = { id: 5, sessionId: 9, iat: 0, exp: 0 };

  beforeEach(async () => {
    jest.clearAllMocks();

    const module: TestingModule = await Test.createTestingModule({
      controllers: [EventController],
      providers: [{ provide: EventService, useValue: mockEventService }],
    })
      .overrideGuard(JWTAuthGuard)
      .useValue({ canActivate: jest.fn(() => true) })
      .compile();

    controller = module.get(EventController);
  });

  it('should list events for an anonymous caller', async () => {
    await controller.findAll({}, undefined);

    expect(mockEventService.findAll).toHaveBeenCalledWith({}, null);
  });

  it('should pass the caller to the detail view', async () => {
    await controller.findOne('board-game-night-k3x9a', user);

    expect(mockEventService.findBySlug).toHaveBeenCalledWith(
      'board-game-night-k3x9a',
      5,
    );
  });

  it('should update as the signed-in user', async () => {
    await controller.update(user, 'board-game-night-k3x9a', { title: 'New' });

    expect(mockEventService.update).toHaveBeenCalledWith(
      'board-game-night-k3x9a',
      5,
      { title: 'New' },
    );
  });

  describe('join', () => {
    it('should answer a successful join', async () => {
      mockEventService.join.mockResolvedValue(JoinOutcome.Joined);

      await expect(
        controller.join(user, 'board-game-night-k3x9a'),
      ).resolves.toEqual({ status: 'joined' });
    });

    it('should answer a full event with a conflict', async () => {
      mockEventService.join.mockResolvedValue(JoinOutcome.CapacityExceeded);

      await expect(
        controller.join(user, 'board-game-night-k3x9a'),
      ).rejects.toMatchObject({
        response: { errors: { participation: 'capacityExceeded' } },
      });
    });

    it('should answer a repeat join with a conflict', async () => {
      mockEventService.join.mockResolvedValue(JoinOutcome.AlreadyJoined);

      await expect(
        controller.join(user, 'board-game-night-k3x9a'),
      ).rejects.toThrow(ConflictException);
    });

    it('should answer a vanished event with not found', async () => {
      mockEventService.join.mockResolvedValue(JoinOutcome.EventNotFound);

      await expect(
        controller.join(user, 'board-game-night-k3x9a'),
      ).rejects.toThrow(NotFoundException);
    });
  });

  describe('withdraw', () => {
    it('should answer a withdrawal', async () => {
      mockEventService.withdraw.mockResolvedValue(WithdrawOutcome.Withdrawn);

      await expect(
        controller.withdraw(user, 'board-game-night-k3x9a'),
      ).resolves.toEqual({ status: 'withdrawn' });
    });

    it('should answer a non-participant with a conflict', async () => {
      mockEventService.withdraw.mockResolvedValue(
        WithdrawOutcome.NotAParticipant,
      );

      await expect(
        controller.withdraw(user, 'board-game-night-k3x9a'),
      ).rejects.toMatchObject({
        response: { errors: { participation: 'notAParticipant' } },
      });
    });
  });
});
