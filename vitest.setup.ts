import { Logger } from '@nestjs/common';

// Keep formatter debug/warn output out of test runs
Logger.overrideLogger(false);
