import { Global, Module } from '@nestjs/common';
import { JournalConfigService } from './journal-config.service';

@Global()
@Module({
  providers: [JournalConfigService],
  exports: [JournalConfigService],
})
export class JournalConfigModule {}
