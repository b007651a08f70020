import { LinkedInPost } from './LinkedInPost';
import { TwitterPost } from './TwitterPost';
import { FollowerSnapshot } from './FollowerSnapshot';
import { DailyImpression } from './DailyImpression';
import { ContentPipelineItem } from './ContentPipelineItem';
import { CalendarItem } from './CalendarItem';

export { LinkedInPost, TwitterPost, FollowerSnapshot, DailyImpression, ContentPipelineItem, CalendarItem };

export const ENTITIES = [
  LinkedInPost,
  TwitterPost,
  FollowerSnapshot,
  DailyImpression,
  ContentPipelineItem,
  CalendarItem,
];
