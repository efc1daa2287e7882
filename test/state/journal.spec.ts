import {
  Journal,
  JournaledMap,
  JournaledSet,
  JournaledValue,
} from '../../src/state/journal';

/**
 * Journal 테스트
 *
 * 테스트 범위:
 * - checkpoint / commit / revert
 * - 중첩 checkpoint 병합
 * - 체크포인트 밖 쓰기는 확정
 */
describe('Journal', () => {
  let journal: Journal;
  let map: JournaledMap<string, number>;
  let set: JournaledSet<string>;
  let value: JournaledValue<bigint>;

  beforeEach(() => {
    journal = new Journal();
    map = new JournaledMap<string, number>(journal);
    set = new JournaledSet<string>(journal);
    value = new JournaledValue<bigint>(journal, 10n);
  });

  it('revert는 checkpoint 이후의 모든 쓰기를 되돌려야 함', () => {
    map.set('a', 1);
    journal.checkpoint();

    map.set('a', 2);
    map.set('b', 3);
    set.add('x');
    value.set(20n);
    journal.revertCheckpoint();

    expect(map.get('a')).toBe(1);
    expect(map.has('b')).toBe(false);
    expect(set.has('x')).toBe(false);
    expect(value.get()).toBe(10n);
    expect(journal.depth).toBe(0);
  });

  it('commit 후에는 변경이 유지되어야 함', () => {
    journal.checkpoint();
    map.set('a', 1);
    journal.commitCheckpoint();

    expect(map.get('a')).toBe(1);
  });

  it('중첩 commit은 바깥 revert에 포함되어야 함', () => {
    journal.checkpoint();
    value.set(11n);

    journal.checkpoint();
    value.set(12n);
    map.set('inner', 1);
    journal.commitCheckpoint();

    expect(value.get()).toBe(12n);
    journal.revertCheckpoint();

    expect(value.get()).toBe(10n);
    expect(map.size).toBe(0);
  });

  it('안쪽 revert는 바깥 변경을 유지해야 함', () => {
    journal.checkpoint();
    map.set('outer', 1);

    journal.checkpoint();
    map.delete('outer');
    journal.revertCheckpoint();

    expect(map.get('outer')).toBe(1);
    journal.commitCheckpoint();
    expect(map.get('outer')).toBe(1);
  });

  it('삭제를 되돌리면 이전 값이 복원되어야 함', () => {
    set.add('x');
    journal.checkpoint();
    set.delete('x');
    expect(set.has('x')).toBe(false);

    journal.revertCheckpoint();
    expect(set.has('x')).toBe(true);
  });

  it('없는 키 삭제는 false를 반환해야 함', () => {
    expect(map.delete('missing')).toBe(false);
  });

  it('빈 스택에서 commit/revert는 에러를 던져야 함', () => {
    expect(() => journal.commitCheckpoint()).toThrow(
      'Cannot commit: journal stack is empty',
    );
    expect(() => journal.revertCheckpoint()).toThrow(
      'Cannot revert: journal stack is empty',
    );
  });
});
