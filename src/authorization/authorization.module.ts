import { Module } from '@nestjs/common';
import { DelegationModule } from '../delegation/delegation.module';
import { KeysModule } from '../keys/keys.module';
import { ValidatorModule } from '../validator/validator.module';
import { CommitmentAuthorizerService } from './commitment-authorizer.service';

/**
 * Authorization Module
 *
 * 레지스트리 + DelegationStore + 키 소스를 묶어 커밋먼트 요청을 인가
 */
@Module({
  imports: [KeysModule, DelegationModule, ValidatorModule],
  providers: [CommitmentAuthorizerService],
  exports: [CommitmentAuthorizerService],
})
export class AuthorizationModule {}
