import { DataSource, EntityManager } from 'typeorm';
import { Logger } from '@nestjs/common';

const logger = new Logger('TransactionHelper');

/**
 * Scoped transaction acquisition: begin, run the callback, commit or roll
 * back, and always release the query runner.
 */
export class TransactionHelper {
  /**
   * @param operationCallback Receives the transactional entity manager. Any
   * rejection rolls the whole transaction back and is rethrown.
   */
  static async runInTransaction<T>(
    dataSource: DataSource,
    operationCallback: (entityManager: EntityManager) => Promise<T>,
  ): Promise<T> {
    const queryRunner = dataSource.createQueryRunner();

    await queryRunner.connect();
    await queryRunner.startTransaction();

    try {
      const result = await operationCallback(queryRunner.manager);
      await queryRunner.commitTransaction();
      return result;
    } catch (err) {
      logger.error(
        `Transaction failed: ${err instanceof Error ? err.message : String(err)}`,
      );
      await queryRunner.rollbackTransaction();
      throw err;
    } finally {
      await queryRunner.release();
    }
  }
}
