/**
 * Journal
 *
 * 중첩 checkpoint를 지원하는 되돌리기(undo) 로그
 *
 * 동작:
 * - checkpoint(): 스택에 새 프레임 push
 * - 각 쓰기 연산은 "이전 값으로 되돌리는 함수"를 최상단 프레임에 기록
 * - commitCheckpoint(): 최상단 프레임을 하위 프레임에 병합 (최하위면 버림)
 * - revertCheckpoint(): 최상단 프레임의 undo를 역순으로 실행
 *
 * 스택이 비어 있을 때의 쓰기는 기록되지 않음 (되돌릴 수 없는 확정 상태)
 */
export interface Journaled {
  checkpoint(): void;
  commitCheckpoint(): void;
  revertCheckpoint(): void;
}

type Undo = () => void;

export class Journal implements Journaled {
  private frames: Undo[][] = [];

  get depth(): number {
    return this.frames.length;
  }

  record(undo: Undo): void {
    if (this.frames.length === 0) {
      return;
    }
    this.frames[this.frames.length - 1].push(undo);
  }

  checkpoint(): void {
    this.frames.push([]);
  }

  commitCheckpoint(): void {
    const top = this.frames.pop();
    if (!top) {
      throw new Error('Cannot commit: journal stack is empty');
    }
    if (this.frames.length > 0) {
      this.frames[this.frames.length - 1].push(...top);
    }
  }

  revertCheckpoint(): void {
    const top = this.frames.pop();
    if (!top) {
      throw new Error('Cannot revert: journal stack is empty');
    }
    for (let i = top.length - 1; i >= 0; i--) {
      top[i]();
    }
  }
}

/**
 * 저널에 연결된 Map
 *
 * 값은 불변 레코드로 취급: 수정은 항상 set()으로 교체
 */
export class JournaledMap<K, V extends {}> {
  private readonly entries = new Map<K, V>();

  constructor(private readonly journal: Journal) {}

  get size(): number {
    return this.entries.size;
  }

  get(key: K): V | undefined {
    return this.entries.get(key);
  }

  has(key: K): boolean {
    return this.entries.has(key);
  }

  set(key: K, value: V): void {
    this.remember(key);
    this.entries.set(key, value);
  }

  delete(key: K): boolean {
    if (!this.entries.has(key)) {
      return false;
    }
    this.remember(key);
    return this.entries.delete(key);
  }

  values(): IterableIterator<V> {
    return this.entries.values();
  }

  private remember(key: K): void {
    const previous = this.entries.get(key);
    if (previous === undefined) {
      this.journal.record(() => {
        this.entries.delete(key);
      });
    } else {
      this.journal.record(() => {
        this.entries.set(key, previous);
      });
    }
  }
}

/**
 * 저널에 연결된 Set
 */
export class JournaledSet<T> {
  private readonly members = new Set<T>();

  constructor(private readonly journal: Journal) {}

  get size(): number {
    return this.members.size;
  }

  has(value: T): boolean {
    return this.members.has(value);
  }

  add(value: T): void {
    if (this.members.has(value)) {
      return;
    }
    this.members.add(value);
    this.journal.record(() => {
      this.members.delete(value);
    });
  }

  delete(value: T): void {
    if (!this.members.delete(value)) {
      return;
    }
    this.journal.record(() => {
      this.members.add(value);
    });
  }
}

/**
 * 저널에 연결된 단일 값
 */
export class JournaledValue<T> {
  constructor(
    private readonly journal: Journal,
    private value: T,
  ) {}

  get(): T {
    return this.value;
  }

  set(next: T): void {
    const previous = this.value;
    this.journal.record(() => {
      this.value = previous;
    });
    this.value = next;
  }
}
