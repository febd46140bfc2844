import { Octokit } from '@octokit/rest';
import type { RestEndpointMethodTypes } from '@octokit/rest';
import type { CommentEvent, Config, Lookup, OrgMember, ReviewRequest, TimelineEvent } from './types.ts';

type PullRequestSummary = RestEndpointMethodTypes['pulls']['list']['response']['data'][number];

interface PullRequestDetails {
  commentCount: number;
  approvalStates: string[];
  lastPushAt: Date | null;
}

const BATCH_SIZE = 10;

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function isRateLimitError(error: unknown): boolean {
  return errorMessage(error).toLowerCase().includes('rate limit');
}

function toTimelineEvent(item: unknown): TimelineEvent | null {
  if (typeof item !== 'object' || item === null) return null;
  if (!('event' in item) || typeof item.event !== 'string') return null;
  if (!('created_at' in item) || typeof item.created_at !== 'string') return null;
  return { kind: item.event, createdAt: new Date(item.created_at) };
}

export class GitHubSource {
  private octokit: Octokit;
  private organization: string;

  constructor(config: Pick<Config, 'organization'> & { githubToken: string }) {
    this.octokit = new Octokit({ auth: config.githubToken });
    this.organization = config.organization;
  }

  /**
   * Check and display API rate limit status
   */
  async checkRateLimit(): Promise<void> {
    try {
      const { data } = await this.octokit.rateLimit.get();
      const core = data.resources.core;

      const resetTime = new Date(core.reset * 1000);
      const minutesUntilReset = Math.ceil((resetTime.getTime() - Date.now()) / 60000);

      console.log('\n⚡ GitHub API Rate Limit Status:');
      console.log(`  Core API: ${core.remaining}/${core.limit} requests remaining`);
      if (core.remaining === 0) {
        console.log(`    ❌ DEPLETED! Resets in ${minutesUntilReset} minutes at ${resetTime.toLocaleTimeString()}`);
      } else if (core.remaining < 100) {
        console.log(`    ⚠️  Low! Resets in ${minutesUntilReset} minutes at ${resetTime.toLocaleTimeString()}`);
      } else {
        console.log(`    ✓ Resets at ${resetTime.toLocaleTimeString()}`);
      }
    } catch (error: unknown) {
      console.log(`  ⚠️  Could not fetch rate limit: ${errorMessage(error)}`);
    }
  }

  /**
   * Wrap a lazy API call so failures become an explicit unavailable marker
   */
  private async lookup<T>(context: string, load: () => Promise<T>): Promise<Lookup<T>> {
    try {
      return { status: 'ok', value: await load() };
    } catch (error: unknown) {
      const reason = errorMessage(error);
      console.warn(`  ⚠️  ${context} unavailable: ${reason}`);
      return { status: 'unavailable', reason };
    }
  }

  private async listComments(repo: string, number: number): Promise<CommentEvent[]> {
    const comments = await this.octokit.paginate(this.octokit.issues.listComments, {
      owner: this.organization,
      repo,
      issue_number: number,
      per_page: 100,
    });
    return comments.map(comment => ({ createdAt: new Date(comment.created_at) }));
  }

  private async listTimeline(repo: string, number: number): Promise<TimelineEvent[]> {
    const items: unknown[] = await this.octokit.paginate(this.octokit.issues.listEventsForTimeline, {
      owner: this.organization,
      repo,
      issue_number: number,
      per_page: 100,
    });
    return items
      .map(toTimelineEvent)
      .filter((event): event is TimelineEvent => event !== null);
  }

  private async fetchDetails(repo: string, number: number): Promise<PullRequestDetails> {
    const [pull, reviews] = await Promise.all([
      this.octokit.pulls.get({ owner: this.organization, repo, pull_number: number }),
      this.octokit.paginate(this.octokit.pulls.listReviews, {
        owner: this.organization,
        repo,
        pull_number: number,
        per_page: 100,
      }),
    ]);

    // The PR commit list is capped at 250 entries; read the head commit instead
    const head = await this.octokit.repos.getCommit({
      owner: this.organization,
      repo,
      ref: pull.data.head.sha,
    });
    const pushedAt = head.data.commit.committer?.date;

    return {
      commentCount: pull.data.comments,
      approvalStates: reviews.map(review => review.state.toLowerCase()),
      lastPushAt: pushedAt ? new Date(pushedAt) : null,
    };
  }

  private toReviewRequest(repo: string, pr: PullRequestSummary, details: PullRequestDetails): ReviewRequest {
    return {
      id: pr.number,
      title: pr.title,
      url: pr.html_url,
      createdAt: new Date(pr.created_at),
      closedAt: pr.closed_at ? new Date(pr.closed_at) : null,
      commentCount: details.commentCount,
      approvalStates: details.approvalStates,
      labels: new Set(pr.labels.map(label => label.name)),
      isDraft: pr.draft ?? false,
      lastPushAt: details.lastPushAt,
      authorId: pr.user?.login ?? '',
      loadComments: () => this.lookup(`Comments for #${pr.number}`, () => this.listComments(repo, pr.number)),
      loadTimeline: () => this.lookup(`Timeline for #${pr.number}`, () => this.listTimeline(repo, pr.number)),
    };
  }

  /**
   * Fetch every open pull request with its comment count, reviews and head commit date
   */
  async fetchOpenRequests(repo: string): Promise<ReviewRequest[]> {
    console.log(`Fetching open pull requests for ${this.organization}/${repo}...`);

    try {
      const pulls = await this.octokit.paginate(this.octokit.pulls.list, {
        owner: this.organization,
        repo,
        state: 'open',
        per_page: 100,
      });

      // Details are fetched in parallel batches; order is preserved
      const requests: ReviewRequest[] = [];
      for (let i = 0; i < pulls.length; i += BATCH_SIZE) {
        const batch = pulls.slice(i, i + BATCH_SIZE);
        const results = await Promise.all(
          batch.map(async pr => this.toReviewRequest(repo, pr, await this.fetchDetails(repo, pr.number)))
        );
        requests.push(...results);
      }

      console.log(`✓ Processed ${requests.length} open pull requests`);
      return requests;
    } catch (error: unknown) {
      if (isRateLimitError(error)) {
        await this.checkRateLimit();
      }
      throw new Error(`Failed to fetch open pull requests for ${repo}: ${errorMessage(error)}`, { cause: error });
    }
  }

  /**
   * Fetch pull requests closed since `since`, newest-closed first.
   * Comment counts and reviews are not fetched for closed requests.
   */
  async fetchClosedRequests(repo: string, since: Date): Promise<ReviewRequest[]> {
    console.log(`Fetching closed pull requests for ${this.organization}/${repo}...`);

    try {
      const pulls: PullRequestSummary[] = [];
      const pages = this.octokit.paginate.iterator(this.octokit.pulls.list, {
        owner: this.organization,
        repo,
        state: 'closed',
        sort: 'updated',
        direction: 'desc',
        per_page: 100,
      });

      // A request closed inside the window was updated inside it too
      pageLoop: for await (const { data } of pages) {
        for (const pr of data) {
          if (new Date(pr.updated_at) < since) break pageLoop;
          if (pr.closed_at) pulls.push(pr);
        }
      }

      const requests = pulls
        .map(pr => this.toReviewRequest(repo, pr, { commentCount: 0, approvalStates: [], lastPushAt: null }))
        .sort((a, b) => (b.closedAt?.getTime() ?? 0) - (a.closedAt?.getTime() ?? 0));

      console.log(`✓ Found ${requests.length} recently closed pull requests`);
      return requests;
    } catch (error: unknown) {
      if (isRateLimitError(error)) {
        await this.checkRateLimit();
      }
      throw new Error(`Failed to fetch closed pull requests for ${repo}: ${errorMessage(error)}`, { cause: error });
    }
  }

  /**
   * Fetch organization members with their public email
   */
  async fetchOrgMembers(): Promise<OrgMember[]> {
    console.log(`Fetching organization members for ${this.organization}...`);

    try {
      const members = await this.octokit.paginate(this.octokit.orgs.listMembers, {
        org: this.organization,
        per_page: 100,
      });

      const result: OrgMember[] = [];
      for (let i = 0; i < members.length; i += BATCH_SIZE) {
        const batch = members.slice(i, i + BATCH_SIZE);
        const profiles = await Promise.all(
          batch.map(member => this.octokit.users.getByUsername({ username: member.login }))
        );
        result.push(...profiles.map(({ data }) => ({ login: data.login, email: data.email ?? null })));
      }

      console.log(`✓ Found ${result.length} organization members`);
      return result;
    } catch (error: unknown) {
      throw new Error(`Failed to fetch org members: ${errorMessage(error)}`, { cause: error });
    }
  }
}
