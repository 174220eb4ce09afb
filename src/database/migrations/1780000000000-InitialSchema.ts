import { MigrationInterface, QueryRunner } from 'typeorm';

export class InitialSchema1780000000000 implements MigrationInterface {
  name = 'InitialSchema1780000000000';

  public async up(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query(
      `CREATE TABLE "users" ("id" SERIAL NOT NULL, "ulid" character(26) NOT NULL, "email" character varying NOT NULL, "password" character varying NOT NULL, "isVerified" boolean NOT NULL DEFAULT false, "createdAt" TIMESTAMP WITH TIME ZONE NOT NULL DEFAULT now(), "updatedAt" TIMESTAMP WITH TIME ZONE NOT NULL DEFAULT now(), "deletedAt" TIMESTAMP WITH TIME ZONE, CONSTRAINT "UQ_users_ulid" UNIQUE ("ulid"), CONSTRAINT "UQ_users_email" UNIQUE ("email"), CONSTRAINT "PK_users" PRIMARY KEY ("id"))`,
    );
    await queryRunner.query(
      `CREATE TABLE "sessions" ("id" SERIAL NOT NULL, "userId" integer NOT NULL, "hash" character varying NOT NULL, "createdAt" TIMESTAMP WITH TIME ZONE NOT NULL DEFAULT now(), "updatedAt" TIMESTAMP WITH TIME ZONE NOT NULL DEFAULT now(), "deletedAt" TIMESTAMP WITH TIME ZONE, CONSTRAINT "PK_sessions" PRIMARY KEY ("id"))`,
    );
    await queryRunner.query(
      `CREATE INDEX "IDX_sessions_userId" ON "sessions" ("userId")`,
    );
    await queryRunner.query(
      `CREATE TYPE "verificationTokens_purpose_enum" AS ENUM('email-verification', 'password-reset')`,
    );
    await queryRunner.query(
      `CREATE TABLE "verificationTokens" ("id" SERIAL NOT NULL, "userId" integer NOT NULL, "purpose" "verificationTokens_purpose_enum" NOT NULL, "tokenHash" character(64) NOT NULL, "createdAt" TIMESTAMP WITH TIME ZONE NOT NULL, "expiresAt" TIMESTAMP WITH TIME ZONE NOT NULL, "consumedAt" TIMESTAMP WITH TIME ZONE, "revokedAt" TIMESTAMP WITH TIME ZONE, CONSTRAINT "UQ_verificationTokens_tokenHash" UNIQUE ("tokenHash"), CONSTRAINT "PK_verificationTokens" PRIMARY KEY ("id"))`,
    );
    await queryRunner.query(
      `CREATE INDEX "IDX_verificationTokens_userId_purpose" ON "verificationTokens" ("userId", "purpose")`,
    );
    await queryRunner.query(
      `CREATE INDEX "IDX_verificationTokens_expiresAt" ON "verificationTokens" ("expiresAt")`,
    );
    await queryRunner.query(
      `CREATE TABLE "events" ("id" SERIAL NOT NULL, "slug" character varying(300) NOT NULL, "title" character varying(256) NOT NULL, "description" text NOT NULL DEFAULT '', "startDate" TIMESTAMP WITH TIME ZONE NOT NULL, "endDate" TIMESTAMP WITH TIME ZONE, "capacity" integer, "participantsCount" integer NOT NULL DEFAULT 0, "ownerId" integer NOT NULL, "createdAt" TIMESTAMP WITH TIME ZONE NOT NULL DEFAULT now(), "updatedAt" TIMESTAMP WITH TIME ZONE NOT NULL DEFAULT now(), CONSTRAINT "UQ_events_slug" UNIQUE ("slug"), CONSTRAINT "CHK_events_capacity" CHECK ("capacity" IS NULL OR "capacity" >= 1), CONSTRAINT "PK_events" PRIMARY KEY ("id"))`,
    );
    await queryRunner.query(
      `CREATE INDEX "IDX_events_startDate_id" ON "events" ("startDate", "id")`,
    );
    await queryRunner.query(
      `CREATE INDEX "IDX_events_ownerId" ON "events" ("ownerId")`,
    );
    await queryRunner.query(
      `CREATE TABLE "eventParticipants" ("id" SERIAL NOT NULL, "eventId" integer NOT NULL, "userId" integer NOT NULL, "createdAt" TIMESTAMP WITH TIME ZONE NOT NULL DEFAULT now(), CONSTRAINT "UQ_eventParticipants_eventId_userId" UNIQUE ("eventId", "userId"), CONSTRAINT "PK_eventParticipants" PRIMARY KEY ("id"))`,
    );
    await queryRunner.query(
      `CREATE INDEX "IDX_eventParticipants_userId" ON "eventParticipants" ("userId")`,
    );
    await queryRunner.query(
      `CREATE TYPE "tasks_status_enum" AS ENUM('pending', 'running', 'succeeded', 'failed')`,
    );
    await queryRunner.query(
      `CREATE TABLE "tasks" ("id" SERIAL NOT NULL, "kind" character varying(64) NOT NULL, "payload" jsonb NOT NULL DEFAULT '{}', "status" "tasks_status_enum" NOT NULL DEFAULT 'pending', "attempts" integer NOT NULL DEFAULT 0, "maxAttempts" integer NOT NULL, "runAt" TIMESTAMP WITH TIME ZONE NOT NULL, "lockedAt" TIMESTAMP WITH TIME ZONE, "lastError" text, "uniqueKey" character varying(255), "createdAt" TIMESTAMP WITH TIME ZONE NOT NULL DEFAULT now(), "updatedAt" TIMESTAMP WITH TIME ZONE NOT NULL DEFAULT now(), CONSTRAINT "UQ_tasks_uniqueKey" UNIQUE ("uniqueKey"), CONSTRAINT "PK_tasks" PRIMARY KEY ("id"))`,
    );
    await queryRunner.query(
      `CREATE INDEX "IDX_tasks_status_runAt" ON "tasks" ("status", "runAt")`,
    );
    await queryRunner.query(
      `ALTER TABLE "sessions" ADD CONSTRAINT "FK_sessions_userId" FOREIGN KEY ("userId") REFERENCES "users"("id") ON DELETE CASCADE ON UPDATE NO ACTION`,
    );
    await queryRunner.query(
      `ALTER TABLE "verificationTokens" ADD CONSTRAINT "FK_verificationTokens_userId" FOREIGN KEY ("userId") REFERENCES "users"("id") ON DELETE CASCADE ON UPDATE NO ACTION`,
    );
    await queryRunner.query(
      `ALTER TABLE "events" ADD CONSTRAINT "FK_events_ownerId" FOREIGN KEY ("ownerId") REFERENCES "users"("id") ON DELETE CASCADE ON UPDATE NO ACTION`,
    );
    await queryRunner.query(
      `ALTER TABLE "eventParticipants" ADD CONSTRAINT "FK_eventParticipants_eventId" FOREIGN KEY ("eventId") REFERENCES "events"("id") ON DELETE CASCADE ON UPDATE NO ACTION`,
    );
    await queryRunner.query(
      `ALTER TABLE "eventParticipants" ADD CONSTRAINT "FK_eventParticipants_userId" FOREIGN KEY ("userId") REFERENCES "users"("id") ON DELETE CASCADE ON UPDATE NO ACTION`,
    );
  }

  public async down(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query(`DROP TABLE "eventParticipants"`);
    await queryRunner.query(`DROP TABLE "events"`);
    await queryRunner.query(`DROP TABLE "tasks"`);
    await queryRunner.query(`DROP TYPE "tasks_status_enum"`);
    await queryRunner.query(`DROP TABLE "verificationTokens"`);
    await queryRunner.query(`DROP TYPE "verificationTokens_purpose_enum"`);
    await queryRunner.query(`DROP TABLE "sessions"`);
    await queryRunner.query(`DROP TABLE "users"`);
  }
}
