import { MigrationInterface, QueryRunner } from 'typeorm';

export class CreateOrdersAndUsageLog1760000000000 implements MigrationInterface {
  name = 'CreateOrdersAndUsageLog1760000000000';

  public async up(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query(`CREATE EXTENSION IF NOT EXISTS "uuid-ossp"`);

    // IF NOT EXISTS: databases that already hold these tables are adopted as they are
    await queryRunner.query(`
      CREATE TABLE IF NOT EXISTS "orders" (
        "id" uuid NOT NULL DEFAULT uuid_generate_v4(),
        "telegram_user_id" bigint NOT NULL,
        "telegram_username" varchar(100),
        "vin" varchar(17),
        "contact_info" text NOT NULL,
        "parts_needed" text NOT NULL,
        "created_at" TIMESTAMP NOT NULL DEFAULT now(),
        CONSTRAINT "PK_orders" PRIMARY KEY ("id")
      )
    `);

    await queryRunner.query(`
      CREATE TABLE IF NOT EXISTS "bot_usage_log" (
        "id" uuid NOT NULL DEFAULT uuid_generate_v4(),
        "user_id" bigint NOT NULL,
        "username" varchar(100),
        "first_name" varchar(255),
        "interaction_type" varchar(50) NOT NULL,
        "interaction_detail" text,
        "created_at" TIMESTAMP NOT NULL DEFAULT now(),
        CONSTRAINT "PK_bot_usage_log" PRIMARY KEY ("id")
      )
    `);

    await queryRunner.query(
      `CREATE INDEX IF NOT EXISTS "IDX_bot_usage_log_user_id" ON "bot_usage_log" ("user_id")`,
    );
  }

  public async down(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query(`DROP INDEX IF EXISTS "IDX_bot_usage_log_user_id"`);
    await queryRunner.query(`DROP TABLE IF EXISTS "bot_usage_log"`);
    await queryRunner.query(`DROP TABLE IF EXISTS "orders"`);
  }
}
