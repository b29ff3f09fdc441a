/**
 * Blog Store
 *
 * In-memory persistence for the sample domain. Each collection keeps its
 * records in insertion order and hands out sequential string ids.
 */

export interface Person {
  id: string;
  name: string;
  email: string;
}

export interface Post {
  id: string;
  title: string;
  body: string;
  createdAt: string;
  authorId: string | null;
  tagIds: string[];
}

export interface Comment {
  id: string;
  body: string;
  postId: string;
  authorId: string;
}

export interface Tag {
  id: string;
  name: string;
}

export class Collection<T extends { id: string }> {
  private readonly records = new Map<string, T>();
  private sequence = 0;

  /** Next free id; client-generated ids are accepted as-is */
  nextId(): string {
    do {
      this.sequence += 1;
    } while (this.records.has(String(this.sequence)));
    return String(this.sequence);
  }

  all(): T[] {
    return Array.from(this.records.values());
  }

  get(id: string): T | undefined {
    return this.records.get(id);
  }

  has(id: string): boolean {
    return this.records.has(id);
  }

  where(predicate: (record: T) => boolean): T[] {
    return this.all().filter(predicate);
  }

  save(record: T): T {
    this.records.set(record.id, record);
    return record;
  }

  remove(id: string): boolean {
    return this.records.delete(id);
  }
}

export class BlogStore {
  readonly people = new Collection<Person>();
  readonly posts = new Collection<Post>();
  readonly comments = new Collection<Comment>();
  readonly tags = new Collection<Tag>();

  /** Removes a post together with its comments */
  removePost(id: string): void {
    for (const comment of this.comments.where((c) => c.postId === id)) {
      this.comments.remove(comment.id);
    }
    this.posts.remove(id);
  }

  /** Removes a person, their comments, and unsets them as author */
  removePerson(id: string): void {
    for (const comment of this.comments.where((c) => c.authorId === id)) {
      this.comments.remove(comment.id);
    }
    for (const post of this.posts.where((p) => p.authorId === id)) {
      this.posts.save({ ...post, authorId: null });
    }
    this.people.remove(id);
  }
}
