import { registerAs } from '@nestjs/config';
import { IsOptional, IsString } from 'class-validator';
import { AppConfig } from './app-config.type';
import validateConfig from '../utils/validate-config';
import { parseLogLevel } from '../utils/log-levels';

class EnvironmentVariablesValidator {
  @IsString()
  @IsOptional()
  LOG_LEVEL?: string;
}

export default registerAs<AppConfig>('app', () => {
  validateConfig(process.env, EnvironmentVariablesValidator);

  return {
    logLevel: parseLogLevel(process.env.LOG_LEVEL),
  };
});
