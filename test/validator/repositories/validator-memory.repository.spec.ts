import { Validator } from '../../../src/validator/entities/validator.entity';
import { ValidatorMemoryRepository } from '../../../src/validator/repositories/validator-memory.repository';
import { CONTROLLER, OPERATOR_A, OPERATOR_B, pubkeyOf } from '../../helpers/fixtures';

describe('ValidatorMemoryRepository', () => {
  let repository: ValidatorMemoryRepository;

  beforeEach(() => {
    repository = new ValidatorMemoryRepository();
  });

  it('없는 pubkey는 null', async () => {
    expect(await repository.findByPubkey(pubkeyOf(1))).toBeNull();
  });

  it('저장 후 조회 (대소문자 무시)', async () => {
    await repository.save(new Validator(pubkeyOf(1), CONTROLLER, OPERATOR_A, 100));

    const found = await repository.findByPubkey(
      `0x${pubkeyOf(1).slice(2).toUpperCase()}`,
    );
    expect(found?.toJSON()).toEqual({
      pubkey: pubkeyOf(1),
      exists: true,
      controller: CONTROLLER,
      authorizedOperator: OPERATOR_A,
      maxCommittedGasLimit: 100,
    });
  });

  it('반환값을 수정해도 save 전에는 저장소가 바뀌지 않음', async () => {
    await repository.save(new Validator(pubkeyOf(1), CONTROLLER, OPERATOR_A, 100));

    const found = await repository.findByPubkey(pubkeyOf(1));
    if (!found) throw new Error('validator not found');
    found.authorizedOperator = OPERATOR_B;

    expect((await repository.findByPubkey(pubkeyOf(1)))?.authorizedOperator).toBe(
      OPERATOR_A,
    );
  });

  it('findAll은 tombstone 포함', async () => {
    const gone = new Validator(pubkeyOf(2), CONTROLLER, OPERATOR_A, 100);
    gone.deregister();
    await repository.save(new Validator(pubkeyOf(1), CONTROLLER, OPERATOR_A, 100));
    await repository.save(gone);

    const all = await repository.findAll();
    expect(all.map((v) => [v.pubkey, v.exists])).toEqual([
      [pubkeyOf(1), true],
      [pubkeyOf(2), false],
    ]);
  });
});
