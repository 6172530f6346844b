import { ConfigModule } from '@nestjs/config';
import { validateEnv } from './env.validation';

/**
 * Global configuration shared by the HTTP server and the CLI contexts.
 */
export const AppConfigModule = ConfigModule.forRoot({
  isGlobal: true,
  validate: validateEnv,
});
