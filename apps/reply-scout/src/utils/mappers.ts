import type { RawItem } from "@/types";
import type { Comment, Submission } from "snoowrap";

const REDDIT_BASE_URL = "https://www.reddit.com";

const toPermalink = (path: string): string =>
  path.startsWith("http") ? path : `${REDDIT_BASE_URL}${path}`;

/**
 * Maps a Snoowrap Submission to a forum post item.
 */
export const mapSubmissionToItem = (submission: Submission): RawItem => {
  return {
    id: submission.id,
    kind: "post",
    title: submission.title,
    body: submission.selftext || "",
    author: submission.author?.name ?? "[deleted]",
    score: submission.score,
    numComments: submission.num_comments,
    createdAt: new Date(submission.created_utc * 1000),
    permalink: toPermalink(submission.permalink),
    subreddit: submission.subreddit.display_name,
  };
};

/**
 * Maps a Snoowrap Comment to a forum comment item attached to its post.
 */
export const mapCommentToItem = (comment: Comment, post: RawItem): RawItem => {
  return {
    id: comment.id,
    kind: "comment",
    body: comment.body || "",
    author: comment.author?.name ?? "[deleted]",
    score: comment.score,
    numComments: 0,
    createdAt: new Date(comment.created_utc * 1000),
    permalink: toPermalink(comment.permalink),
    subreddit: post.subreddit,
    parentPostId: post.id,
    parentPostTitle: post.title,
  };
};

/**
 * Depth-first flattening of a comment tree; parents precede their replies.
 */
export const flattenComments = (comments: Comment[]): Comment[] => {
  const flat: Comment[] = [];
  const visit = (list: Comment[]) => {
    for (const comment of list) {
      flat.push(comment);
      if (comment.replies && comment.replies.length > 0) {
        visit(Array.from(comment.replies));
      }
    }
  };
  visit(comments);
  return flat;
};
