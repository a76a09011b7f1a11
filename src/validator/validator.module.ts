import { Module } from '@nestjs/common';
import { AgentConfig } from '../common/config/agent.config';
import { CryptoService } from '../common/crypto/crypto.service';
import { BlsService } from '../common/crypto/bls.service';
import { DelegationModule } from '../delegation/delegation.module';
import { DelegationVerifierService } from '../delegation/delegation-verifier.service';
import { ValidatorLevelDBRepository } from './repositories/validator-leveldb.repository';
import { ValidatorMemoryRepository } from './repositories/validator-memory.repository';
import { IValidatorRepository } from './repositories/validator.repository.interface';
import { ValidatorService } from './validator.service';
import { RegistryOptions } from './validator.types';

/**
 * Validator Module
 *
 * Validator 레지스트리
 *
 * 구성:
 * - ValidatorService: 등록 / 해제 / 수정 / 조회
 * - IValidatorRepository: REGISTRY_STORAGE에 따라 memory 또는 LevelDB
 * - RegistryOptions: chainId, admin, allowUnsafeRegistration 초기값
 */
@Module({
  imports: [DelegationModule],
  providers: [
    {
      provide: RegistryOptions,
      useFactory: (config: AgentConfig) =>
        new RegistryOptions(
          config.chainId,
          config.registryAdmin,
          config.allowUnsafeRegistration,
        ),
      inject: [AgentConfig],
    },
    {
      provide: IValidatorRepository,
      useFactory: (config: AgentConfig, cryptoService: CryptoService) =>
        config.registryStorage === 'leveldb'
          ? new ValidatorLevelDBRepository(cryptoService, config.registryDataDir)
          : new ValidatorMemoryRepository(),
      inject: [AgentConfig, CryptoService],
    },
    {
      provide: ValidatorService,
      useFactory: (
        repository: IValidatorRepository,
        blsService: BlsService,
        verifier: DelegationVerifierService,
        options: RegistryOptions,
      ) => new ValidatorService(repository, blsService, verifier, options),
      inject: [
        IValidatorRepository,
        BlsService,
        DelegationVerifierService,
        RegistryOptions,
      ],
    },
  ],
  exports: [ValidatorService],
})
export class ValidatorModule {}
