/**
 * backend/src/modules/posts/post.types.ts
 *
 * Forum content. Authors are referenced by numeric id; a withdrawn author keeps the id
 * (anonymized) and the content stays readable.
 */

export type ContentAuthor = {
  id: number;
  nickname: string;
  withdrawn: boolean;
};

export type Post = {
  id: number;
  author: ContentAuthor | null;
  title: string;
  content: string;
  createdAt: Date;
  updatedAt: Date;
};

export type Comment = {
  id: number;
  postId: number;
  author: ContentAuthor | null;
  content: string;
  createdAt: Date;
  updatedAt: Date;
};

export type PostPatch = {
  title?: string;
  content?: string;
};
