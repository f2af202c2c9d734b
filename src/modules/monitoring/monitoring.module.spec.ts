import { describe, it, expect, beforeAll } from 'vitest';
import { Test, TestingModule } from '@nestjs/testing';
import { EventEmitterModule } from '@nestjs/event-emitter';
import { MonitoringModule } from './monitoring.module';
import { EventConsumerService } from './event-consumer.service';

describe('MonitoringModule', () => {
  let module: TestingModule;

  beforeAll(async () => {
    module = await Test.createTestingModule({
      imports: [
        EventEmitterModule.forRoot({ wildcard: true, delimiter: '.' }),
        MonitoringModule,
      ],
    }).compile();
  });

  it('should compile and provide EventConsumerService', () => {
    const service = module.get<EventConsumerService>(EventConsumerService);
    expect(service).toBeInstanceOf(EventConsumerService);
  });
});
