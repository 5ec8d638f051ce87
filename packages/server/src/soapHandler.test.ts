import { describe, expect, it, vi } from 'vitest';
import * as xml2js from 'xml2js';
import {
  ContentDirectoryService,
  createContentDirectoryState,
  InMemoryLibrary,
  SystemUpdateNotifier,
  type LibrarySnapshot,
} from 'cds-core';
import {
  actionFromHeader,
  buildSoapResponse,
  CONTENT_DIRECTORY_SERVICE_TYPE,
  handleControlRequest,
  parseSoapRequest,
  type ContentDirectoryActions,
} from './soapHandler';

const snapshot: LibrarySnapshot = {
  scanTime: 1234,
  artists: [{ id: 1, name: 'Ann' }],
  genres: [{ id: 1, name: 'Rock & Roll' }],
  albums: [{ id: 100, title: 'Blue', artistId: 1, year: 2001 }],
  tracks: [{ id: 1000, title: 'Rock Song', albumId: 100, genreId: 1, trackNumber: 1 }],
  folders: [],
  playlists: [],
  videos: [],
  images: [],
};

const createService = () => {
  const library = new InMemoryLibrary(snapshot);
  const notifier = new SystemUpdateNotifier(createContentDirectoryState(library.lastScanTime()), {
    notifyAll: vi.fn(),
    notifyOne: vi.fn(),
  });
  return new ContentDirectoryService(library, notifier, {
    baseUrl: 'http://host:9000',
    friendlyName: 'Test Server',
    browseAgeLimit: 100,
  });
};

const envelope = (action: string, args: Record<string, string> = {}): string => {
  const inner = Object.entries(args).map(([name, value]) => `<${name}>${value}</${name}>`).join('');
  return '<?xml version="1.0" encoding="utf-8"?>'
    + '<s:Envelope xmlns:s="http://schemas.xmlsoap.org/soap/envelope/" s:encodingStyle="http://schemas.xmlsoap.org/soap/encoding/">'
    + `<s:Body><u:${action} xmlns:u="${CONTENT_DIRECTORY_SERVICE_TYPE}">${inner}</u:${action}></s:Body>`
    + '</s:Envelope>';
};

const browseArgs = (objectId: string, overrides: Record<string, string> = {}) => ({
  ObjectID: objectId,
  BrowseFlag: 'BrowseDirectChildren',
  Filter: '*',
  StartingIndex: '0',
  RequestedCount: '0',
  SortCriteria: '',
  ...overrides,
});

const parseReply = (xml: string): Promise<unknown> =>
  new xml2js.Parser({
    explicitArray: false,
    explicitRoot: false,
    tagNameProcessors: [xml2js.processors.stripPrefix],
  }).parseStringPromise(xml);

const faultOf = (code: number, description: string) => ({
  Body: {
    Fault: {
      faultcode: 's:Client',
      faultstring: 'UPnPError',
      detail: { UPnPError: { errorCode: String(code), errorDescription: description } },
    },
  },
});

describe('parseSoapRequest', () => {
  it('extracts the action name and its arguments', async () => {
    const request = await parseSoapRequest(envelope('Browse', browseArgs('/g', { Filter: '' })));
    expect(request).toEqual({
      action: 'Browse',
      args: {
        ObjectID: '/g',
        BrowseFlag: 'BrowseDirectChildren',
        Filter: '',
        StartingIndex: '0',
        RequestedCount: '0',
        SortCriteria: '',
      },
    });
  });

  it('reads the text of arguments that carry attributes', async () => {
    const request = await parseSoapRequest(envelope('Search', { ContainerID: '<![CDATA[0]]>', Filter: '' }).replace(
      '<Filter></Filter>',
      '<Filter dt="string">dc:title</Filter>',
    ));
    expect(request.args).toEqual({ ContainerID: '0', Filter: 'dc:title' });
  });

  it('accepts an action without arguments', async () => {
    expect(await parseSoapRequest(envelope('GetSystemUpdateID'))).toEqual({ action: 'GetSystemUpdateID', args: {} });
  });

  it.each([
    ['not xml at all', 'Malformed SOAP request'],
    ['<Envelope><Header/></Envelope>', 'SOAP Body not found'],
    ['<Envelope><Body a="1"></Body></Envelope>', 'SOAP Body has no action element'],
  ])('rejects %s', async (xml, message) => {
    await expect(parseSoapRequest(xml)).rejects.toMatchObject({ code: 401, message });
  });
});

describe('actionFromHeader', () => {
  it('takes the name after the hash', () => {
    expect(actionFromHeader(`"${CONTENT_DIRECTORY_SERVICE_TYPE}#Browse"`)).toBe('Browse');
    expect(actionFromHeader('Browse')).toBeUndefined();
    expect(actionFromHeader(undefined)).toBeUndefined();
  });
});

describe('buildSoapResponse', () => {
  it('wraps the values in a u:<action>Response element', () => {
    const xml = buildSoapResponse('GetSystemUpdateID', { Id: 42 });
    expect(xml).toContain(`<s:Body><u:GetSystemUpdateIDResponse xmlns:u="${CONTENT_DIRECTORY_SERVICE_TYPE}"><Id>42</Id></u:GetSystemUpdateIDResponse></s:Body>`);
  });
});

describe('handleControlRequest', () => {
  it('answers Browse with the DIDL-Lite result and the counters', async () => {
    const reply = await handleControlRequest(createService(), envelope('Browse', browseArgs('0')), undefined);
    expect(reply.status).toBe(200);

    const parsed = await parseReply(reply.xml);
    expect(parsed).toMatchObject({
      Body: { BrowseResponse: { NumberReturned: '3', TotalMatches: '3', UpdateID: '1234' } },
    });
    expect(reply.xml).toContain('&lt;container id="/music" parentID="0" restricted="1" searchable="0"&gt;');
  });

  it('escapes names inside the embedded DIDL-Lite document', async () => {
    const reply = await handleControlRequest(createService(), envelope('Browse', browseArgs('/g')), undefined);
    expect(reply.xml).toContain('&lt;dc:title&gt;Rock &amp;amp; Roll&lt;/dc:title&gt;');
  });

  it('fills in defaults for missing optional arguments', async () => {
    const reply = await handleControlRequest(
      createService(),
      envelope('Browse', { ObjectID: '/g', BrowseFlag: 'BrowseDirectChildren' }),
      undefined,
    );
    expect(await parseReply(reply.xml)).toMatchObject({
      Body: { BrowseResponse: { NumberReturned: '1', TotalMatches: '1' } },
    });
  });

  it('answers Search from the root container', async () => {
    const reply = await handleControlRequest(
      createService(),
      envelope('Search', { ContainerID: '0', SearchCriteria: 'dc:title contains "rock"', Filter: '*' }),
      `"${CONTENT_DIRECTORY_SERVICE_TYPE}#Search"`,
    );
    expect(reply.status).toBe(200);
    expect(await parseReply(reply.xml)).toMatchObject({
      Body: { SearchResponse: { NumberReturned: '1', TotalMatches: '1', UpdateID: '1234' } },
    });
    expect(reply.xml).toContain('&lt;item id="/t/1000" parentID="/t" restricted="1"&gt;');
  });

  it('answers the capability and update id queries', async () => {
    const service = createService();
    const caps = await parseReply((await handleControlRequest(service, envelope('GetSortCapabilities'), undefined)).xml);
    expect(caps).toMatchObject({ Body: { GetSortCapabilitiesResponse: { SortCaps: service.getSortCapabilities() } } });

    const id = await parseReply((await handleControlRequest(service, envelope('GetSystemUpdateID'), undefined)).xml);
    expect(id).toMatchObject({ Body: { GetSystemUpdateIDResponse: { Id: '1234' } } });
  });

  it.each([
    ['an unknown object', envelope('Browse', browseArgs('/x')), faultOf(701, 'No such object')],
    ['a missing ObjectID', envelope('Browse', { BrowseFlag: 'BrowseMetadata' }), faultOf(402, 'Missing argument ObjectID')],
    [
      'a non numeric StartingIndex',
      envelope('Browse', browseArgs('/g', { StartingIndex: 'abc' })),
      faultOf(402, 'StartingIndex must be a non-negative integer'),
    ],
    ['an unknown action', envelope('DestroyObject', { ObjectID: '/g' }), faultOf(401, 'Unknown action DestroyObject')],
    ['a body that is not SOAP', 'hello', faultOf(401, 'Malformed SOAP request')],
    [
      'unmappable search criteria',
      envelope('Search', { ContainerID: '0', SearchCriteria: 'upnp:rating = "5"' }),
      faultOf(708, 'Unsupported or invalid search criteria'),
    ],
  ])('returns a UPnP fault for %s', async (_name, body, fault) => {
    const reply = await handleControlRequest(createService(), body, undefined);
    expect(reply.status).toBe(500);
    expect(await parseReply(reply.xml)).toMatchObject(fault);
  });

  it('reports an unexpected failure as 501 Action Failed', async () => {
    const failing: ContentDirectoryActions = {
      browse: async () => {
        throw new Error('library offline');
      },
      search: async () => {
        throw new Error('library offline');
      },
      getSearchCapabilities: () => '',
      getSortCapabilities: () => '',
      getSystemUpdateId: () => 0,
    };
    const reply = await handleControlRequest(failing, envelope('Browse', browseArgs('/g')), undefined);
    expect(reply.status).toBe(500);
    expect(await parseReply(reply.xml)).toMatchObject(faultOf(501, 'Action Failed'));
    expect(reply.xml).not.toContain('library offline');
  });
});
