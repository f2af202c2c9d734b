import { Module } from '@nestjs/common';
import { RiskPolicyService } from './risk-policy.service';

@Module({
  providers: [RiskPolicyService],
  exports: [RiskPolicyService],
})
export class RiskManagementModule {}
