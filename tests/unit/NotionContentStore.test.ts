import axios, { AxiosError, AxiosInstance, AxiosResponse } from 'axios';
import { NotionContentStore, createNotionClient } from '../../src/services/content/NotionContentStore';
import { ExternalServiceError } from '../../src/utils/errors';

interface RecordedRequest {
  method: string;
  url: string;
  body: unknown;
}

interface FakeReply {
  status: number;
  data: unknown;
}

// axios instance whose adapter answers from `handler` instead of the network
function fakeNotion(handler: (request: RecordedRequest) => FakeReply): {
  client: AxiosInstance;
  requests: RecordedRequest[];
} {
  const requests: RecordedRequest[] = [];
  const client = axios.create({
    baseURL: 'https://notion.test/v1',
    adapter: async (config) => {
      const request: RecordedRequest = {
        method: (config.method ?? 'get').toUpperCase(),
        url: config.url ?? '',
        body: typeof config.data === 'string' ? JSON.parse(config.data) : undefined,
      };
      requests.push(request);

      const reply = handler(request);
      const response: AxiosResponse = {
        data: reply.data,
        status: reply.status,
        statusText: String(reply.status),
        headers: {},
        config,
      };
      if (reply.status >= 400) {
        throw new AxiosError(`Request failed with status code ${reply.status}`, 'ERR_BAD_RESPONSE', config, null, response);
      }
      return response;
    },
  });
  return { client, requests };
}

const page = (id: string, topic: string, draft: string | null = null) => ({
  object: 'page',
  id,
  created_time: '2024-03-01T09:00:00.000Z',
  last_edited_time: '2024-03-01T09:00:00.000Z',
  properties: {
    Topic: { type: 'title', title: [{ plain_text: topic, text: { content: topic } }] },
    Status: { type: 'select', select: { name: draft ? 'Drafted' : 'Pending' } },
    Draft: { type: 'rich_text', rich_text: draft ? [{ plain_text: draft, text: { content: draft } }] : [] },
  },
});

const PAGE_ID = '1f2e3d4c-5b6a-4978-8a9b-0c1d2e3f4a5b';
const DATABASES = { pipelineDatabaseId: 'pipeline-db', calendarDatabaseId: 'calendar-db' };

describe('NotionContentStore', () => {
  it('should create pipeline pages in the pipeline database', async () => {
    const { client, requests } = fakeNotion(() => ({
      status: 200,
      data: { id: 'page-1', properties: { Status: { select: { name: 'Inspiration' } } } },
    }));
    const store = new NotionContentStore(client, DATABASES);

    const added = await store.addPipelineItem('Hiring trends', 'https://example.com/a');

    expect(added).toEqual({ id: 'page-1', topic: 'Hiring trends', status: 'Inspiration' });
    expect(requests).toEqual([
      {
        method: 'POST',
        url: '/pages',
        body: {
          parent: { database_id: 'pipeline-db' },
          properties: {
            Topic: { title: [{ text: { content: 'Hiring trends' } }] },
            Status: { select: { name: 'Inspiration' } },
            'Original URL': { url: 'https://example.com/a' },
          },
        },
      },
    ]);
  });

  it('should only send a scheduled date when one is given', async () => {
    const { client, requests } = fakeNotion(() => ({ status: 200, data: page('page-2', 'Launch') }));
    const store = new NotionContentStore(client, DATABASES);

    await store.addCalendarItem('Launch');
    await store.addCalendarItem('Launch', '2024-05-01');

    expect(requests[0].body).toEqual({
      parent: { database_id: 'calendar-db' },
      properties: {
        Topic: { title: [{ text: { content: 'Launch' } }] },
        Status: { select: { name: 'Pending' } },
      },
    });
    expect(requests[1].body).toMatchObject({
      properties: { 'Scheduled Date': { date: { start: '2024-05-01' } } },
    });
  });

  it('should follow query cursors and filter by draft', async () => {
    const { client, requests } = fakeNotion((request) =>
      request.body !== null && typeof request.body === 'object' && 'start_cursor' in request.body
        ? { status: 200, data: { results: [page('page-b', 'Second')], has_more: false, next_cursor: null } }
        : { status: 200, data: { results: [page('page-a', 'First', 'Done')], has_more: true, next_cursor: 'cursor-2' } }
    );
    const store = new NotionContentStore(client, DATABASES);

    const withoutDraft = await store.listCalendarItems(false);

    expect(withoutDraft.map((document) => store.extractTitle(document))).toEqual(['Second']);
    expect(requests.map((request) => request.url)).toEqual([
      '/databases/calendar-db/query',
      '/databases/calendar-db/query',
    ]);
    expect(requests[1].body).toEqual({
      sorts: [{ property: 'Scheduled Date', direction: 'ascending' }],
      page_size: 100,
      start_cursor: 'cursor-2',
    });
  });

  it('should filter pipeline queries by status', async () => {
    const { client, requests } = fakeNotion(() => ({
      status: 200,
      data: { results: [], has_more: false, next_cursor: null },
    }));
    const store = new NotionContentStore(client, DATABASES);

    await expect(store.listPipelineItems('Approved')).resolves.toEqual([]);
    expect(requests[0].body).toEqual({
      filter: { property: 'Status', select: { equals: 'Approved' } },
      sorts: [{ timestamp: 'created_time', direction: 'descending' }],
      page_size: 100,
    });
  });

  it('should truncate drafts and mark the page Drafted', async () => {
    const { client, requests } = fakeNotion(() => ({ status: 200, data: page(PAGE_ID, 'Topic', 'y') }));
    const store = new NotionContentStore(client, DATABASES);

    const updated = await store.updateCalendarDraft(PAGE_ID, 'y'.repeat(2100));

    expect(updated).toEqual({ id: PAGE_ID, draft: 'y'.repeat(2000), status: 'Drafted' });
    expect(requests[0]).toEqual({
      method: 'PATCH',
      url: `/pages/${PAGE_ID}`,
      body: {
        properties: {
          Draft: { rich_text: [{ text: { content: 'y'.repeat(2000) } }] },
          Status: { select: { name: 'Drafted' } },
        },
      },
    });
  });

  it('should resolve null when a page does not exist', async () => {
    const { client } = fakeNotion(() => ({ status: 404, data: { object: 'error', code: 'object_not_found' } }));
    const store = new NotionContentStore(client, DATABASES);

    await expect(store.getCalendarItem(PAGE_ID)).resolves.toBeNull();
    await expect(store.updatePipelineStatus(PAGE_ID, 'Approved')).resolves.toBeNull();
    await expect(store.updatePipelineDraft(PAGE_ID, 'text')).resolves.toBeNull();
  });

  it('should only address pages by their UUID', async () => {
    const compactId = PAGE_ID.replace(/-/g, '');
    const { client, requests } = fakeNotion(() => ({ status: 200, data: page(PAGE_ID, 'Topic') }));
    const store = new NotionContentStore(client, DATABASES);

    await expect(store.updatePipelineStatus('../databases/pipeline-db', 'Drafted')).resolves.toBeNull();
    await expect(store.updateCalendarDraft('page-3', 'text')).resolves.toBeNull();
    await expect(store.getCalendarItem(`${PAGE_ID}/children`)).resolves.toBeNull();
    expect(requests).toEqual([]);

    await store.getCalendarItem(compactId);
    expect(requests.map((request) => `${request.method} ${request.url}`)).toEqual([`GET /pages/${compactId}`]);
  });

  it('should refuse blank drafts before calling the API', async () => {
    const { client, requests } = fakeNotion(() => ({ status: 200, data: page(PAGE_ID, 'Topic') }));
    const store = new NotionContentStore(client, DATABASES);

    await expect(store.updateCalendarDraft(PAGE_ID, '   ')).rejects.toThrow('Draft must not be empty');
    await expect(store.updatePipelineDraft(PAGE_ID, '')).rejects.toThrow('Draft must not be empty');
    expect(requests).toEqual([]);
  });

  it('should report malformed pages as a Notion failure', async () => {
    const { client } = fakeNotion(() => ({ status: 200, data: { object: 'page', id: PAGE_ID } }));
    const store = new NotionContentStore(client, DATABASES);

    const failure = store.getCalendarItem(PAGE_ID);
    await expect(failure).rejects.toBeInstanceOf(ExternalServiceError);
    await expect(failure).rejects.toThrow(`Notion: unexpected page shape: Page ${PAGE_ID} has no properties`);
  });

  it('should wrap other API failures', async () => {
    const { client } = fakeNotion(() => ({ status: 500, data: { object: 'error' } }));
    const store = new NotionContentStore(client, DATABASES);

    const failure = store.listCalendarItems();
    await expect(failure).rejects.toBeInstanceOf(ExternalServiceError);
    await expect(failure).rejects.toMatchObject({
      statusCode: 500,
      message: 'Notion: query database failed: Request failed with status code 500',
    });
  });

  it('should send the API version and token', () => {
    const client = createNotionClient('test-token');

    expect(client.defaults.baseURL).toBe('https://api.notion.com/v1');
    expect(client.defaults.headers['Notion-Version']).toBe('2022-06-28');
    expect(client.defaults.headers.Authorization).toBe('Bearer test-token');
  });
});
