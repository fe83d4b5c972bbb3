import 'reflect-metadata';
import 'dotenv/config';
import { DataSource } from 'typeorm';
import { buildDatabaseSsl, parseDatabaseUrl } from './configuration';

// Standalone data source for the TypeORM migration CLI
const databaseUrl = process.env.DATABASE_URL;
if (!databaseUrl) {
  throw new Error('DATABASE_URL is required to run migrations');
}

const database = parseDatabaseUrl(databaseUrl);
const isProduction = process.env.NODE_ENV === 'production';

const AppDataSource = new DataSource({
  type: 'postgres',
  ...database,
  entities: [__dirname + '/../**/*.entity{.ts,.js}'],
  migrations: [__dirname + '/../migrations/*{.ts,.js}'],
  synchronize: false,
  logging: !isProduction,
  ssl: buildDatabaseSsl(isProduction, process.env.DATABASE_CA_CERT),
});

export default AppDataSource;
