import { Test, TestingModule } from '@nestjs/testing';
import { concatBytes, hexToBytes } from '@ethereumjs/util';
import {
  CommitmentAuthorizerService,
  OperatorAuthorizationRequest,
} from '../../src/authorization/commitment-authorizer.service';
import { AgentConfig, loadAgentConfig } from '../../src/common/config/agent.config';
import { SigningPurpose } from '../../src/common/constants/signing.constants';
import { BlsService } from '../../src/common/crypto/bls.service';
import { CryptoService } from '../../src/common/crypto/crypto.service';
import { UnknownKeyError } from '../../src/common/errors/crypto.errors';
import { Hex } from '../../src/common/types/common.types';
import { signedDelegationToJson } from '../../src/delegation/delegation.codec';
import { DelegationStoreService } from '../../src/delegation/delegation-store.service';
import { DelegationVerifierService } from '../../src/delegation/delegation-verifier.service';
import { IKeySource } from '../../src/keys/key-source.interface';
import { SecretKeysKeySource } from '../../src/keys/local/secret-keys.source';
import { ValidatorMemoryRepository } from '../../src/validator/repositories/validator-memory.repository';
import { IValidatorRepository } from '../../src/validator/repositories/validator.repository.interface';
import { ValidatorService } from '../../src/validator/validator.service';
import { RegistryOptions } from '../../src/validator/validator.types';
import {
  ADMIN,
  bls,
  CONTROLLER,
  MAINNET,
  pubkeyOf,
  secretKey,
  secretKeyHex,
  signedDelegation,
} from '../helpers/fixtures';

/**
 * CommitmentAuthorizerService 테스트
 *
 * 구성:
 * - validator 1: delegatee 10에 위임
 * - validator 2: 위임 없음, 키 소스에 validator 키 있음
 * - validator 3: 위임 없음, 키 소스에 키 없음
 * - 키 소스: 비밀키 2, 10
 */
describe('CommitmentAuthorizerService', () => {
  const operatorKey: Hex = `0x${'11'.repeat(32)}`;
  const intruderKey: Hex = `0x${'22'.repeat(32)}`;
  const objectRoot = new Uint8Array(32).fill(0x42);

  let module: TestingModule;
  let authorizer: CommitmentAuthorizerService;
  let registry: ValidatorService;
  let cryptoService: CryptoService;

  const createModule = async (env: NodeJS.ProcessEnv = {}) => {
    const testingModule = await Test.createTestingModule({
      providers: [
        CryptoService,
        BlsService,
        DelegationVerifierService,
        DelegationStoreService,
        CommitmentAuthorizerService,
        { provide: AgentConfig, useValue: loadAgentConfig(env) },
        { provide: IValidatorRepository, useClass: ValidatorMemoryRepository },
        {
          provide: IKeySource,
          useValue: new SecretKeysKeySource(bls, [secretKeyHex(2), secretKeyHex(10)]),
        },
        {
          provide: ValidatorService,
          useFactory: (
            repository: IValidatorRepository,
            blsService: BlsService,
            verifier: DelegationVerifierService,
          ) =>
            new ValidatorService(
              repository,
              blsService,
              verifier,
              new RegistryOptions(MAINNET, ADMIN, true),
            ),
          inject: [IValidatorRepository, BlsService, DelegationVerifierService],
        },
      ],
    }).compile();

    testingModule
      .get(DelegationStoreService)
      .load([signedDelegationToJson(signedDelegation(1, pubkeyOf(10)))]);
    return testingModule;
  };

  beforeEach(async () => {
    module = await createModule();
    authorizer = module.get(CommitmentAuthorizerService);
    registry = module.get(ValidatorService);
    cryptoService = module.get(CryptoService);
  });

  afterEach(async () => {
    await module.close();
  });

  describe('commitmentDigest', () => {
    it('keccak256(pubkey + slot(u64 LE) + payload hashes)', () => {
      const payload: Hex = `0x${'ab'.repeat(32)}`;
      const slot = Buffer.alloc(8);
      slot.writeBigUInt64LE(123456n);

      expect(authorizer.commitmentDigest(pubkeyOf(1), 123456, [payload])).toBe(
        cryptoService.hashBuffer(
          concatBytes(hexToBytes(pubkeyOf(1)), slot, hexToBytes(payload)),
        ),
      );
    });

    it('slot이 바뀌면 digest도 다름', () => {
      expect(authorizer.commitmentDigest(pubkeyOf(1), 1, [])).not.toBe(
        authorizer.commitmentDigest(pubkeyOf(1), 2, []),
      );
    });

    it('음수 slot은 거부', () => {
      expect(() => authorizer.commitmentDigest(pubkeyOf(1), -1, [])).toThrow(
        'Invalid slot: -1',
      );
    });

    it('32바이트가 아닌 payload hash는 거부', () => {
      expect(() =>
        authorizer.commitmentDigest(pubkeyOf(1), 1, ['0x1234']),
      ).toThrow('Invalid payload hash: 0x1234');
    });
  });

  describe('authorizeOperator', () => {
    const requestFor = (signerKey: Hex): OperatorAuthorizationRequest => {
      const commitmentDigest = authorizer.commitmentDigest(pubkeyOf(1), 10, []);
      return {
        validatorPubkey: pubkeyOf(1),
        commitmentDigest,
        operatorSignature: cryptoService.sign(commitmentDigest, signerKey),
      };
    };

    beforeEach(async () => {
      await registry.registerValidatorUnsafe(CONTROLLER, {
        pubkey: pubkeyOf(1),
        maxCommittedGasLimit: 1_000_000,
        authorizedOperator: cryptoService.privateKeyToAddress(operatorKey),
      });
    });

    it('authorizedOperator가 서명하면 인가', async () => {
      expect(await authorizer.authorizeOperator(requestFor(operatorKey))).toEqual({
        authorized: true,
        operator: cryptoService.privateKeyToAddress(operatorKey),
      });
    });

    it('다른 키로 서명하면 UnauthorizedOperator', async () => {
      const intruder = cryptoService.privateKeyToAddress(intruderKey);

      expect(await authorizer.authorizeOperator(requestFor(intruderKey))).toEqual({
        authorized: false,
        reason: 'UnauthorizedOperator',
        detail: `${intruder} is not the authorized operator`,
      });
    });

    it('recovery id가 잘못되면 InvalidOperatorSignature', async () => {
      const request = requestFor(operatorKey);

      expect(
        await authorizer.authorizeOperator({
          ...request,
          operatorSignature: { ...request.operatorSignature, v: 30 },
        }),
      ).toEqual({
        authorized: false,
        reason: 'InvalidOperatorSignature',
        detail: 'Invalid recovery id: 3',
      });
    });

    it('등록되지 않은 validator는 NotRegisteredValidator', async () => {
      const request = requestFor(operatorKey);

      expect(
        await authorizer.authorizeOperator({
          ...request,
          validatorPubkey: pubkeyOf(5),
        }),
      ).toMatchObject({ authorized: false, reason: 'NotRegisteredValidator' });
    });

    it('등록 해제된 validator는 NotRegisteredValidator', async () => {
      await registry.deregisterValidator(CONTROLLER, pubkeyOf(1));

      expect(
        await authorizer.authorizeOperator(requestFor(operatorKey)),
      ).toMatchObject({ authorized: false, reason: 'NotRegisteredValidator' });
    });
  });

  describe('resolveConstraintSigner', () => {
    it('활성 위임이 있으면 delegatee', async () => {
      expect(await authorizer.resolveConstraintSigner(pubkeyOf(1))).toEqual({
        signer: pubkeyOf(10),
        delegated: true,
        canSignLocally: true,
      });
    });

    it('위임이 없으면 validator 키로 fallback', async () => {
      expect(await authorizer.resolveConstraintSigner(pubkeyOf(2))).toEqual({
        signer: pubkeyOf(2),
        delegated: false,
        canSignLocally: true,
      });
      expect(await authorizer.resolveConstraintSigner(pubkeyOf(3))).toEqual({
        signer: pubkeyOf(3),
        delegated: false,
        canSignLocally: false,
      });
    });

    it('fallback을 끄면 위임 없는 validator는 null', async () => {
      await module.close();
      module = await createModule({ FALLBACK_TO_VALIDATOR_KEY: 'false' });
      authorizer = module.get(CommitmentAuthorizerService);

      expect(await authorizer.resolveConstraintSigner(pubkeyOf(2))).toBeNull();
      expect((await authorizer.resolveConstraintSigner(pubkeyOf(1)))?.signer).toBe(
        pubkeyOf(10),
      );
    });
  });

  describe('signConstraint / verifyConstraint', () => {
    it('delegatee 키로 commitment domain에 서명', async () => {
      const { signer, signature } = await authorizer.signConstraint(
        pubkeyOf(1),
        objectRoot,
      );

      expect(signer).toBe(pubkeyOf(10));
      expect(authorizer.verifyConstraint(pubkeyOf(10), objectRoot, signature)).toBe(
        true,
      );
      expect(authorizer.verifyConstraint(pubkeyOf(1), objectRoot, signature)).toBe(
        false,
      );
    });

    it('delegation domain 서명은 constraint 서명으로 인정되지 않음', () => {
      const delegationDomainSignature = bls.signRoot(
        secretKey(10),
        bls.computeSigningRoot(
          bls.buildSigningRequest(objectRoot, SigningPurpose.Delegation, MAINNET),
        ),
      );

      expect(
        authorizer.verifyConstraint(pubkeyOf(10), objectRoot, delegationDomainSignature),
      ).toBe(false);
    });

    it('서명할 키가 없으면 UnknownKeyError', async () => {
      await expect(
        authorizer.signConstraint(pubkeyOf(3), objectRoot),
      ).rejects.toThrow(new UnknownKeyError(pubkeyOf(3)));
    });
  });
});
