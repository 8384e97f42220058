import { LogLevel } from '@nestjs/common';

export type AppConfig = {
  logLevel: LogLevel;
};
