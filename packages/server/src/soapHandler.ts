// קובץ זה מטפל בבקשות SOAP לנקודת הבקרה של שירות ה-ContentDirectory.
import * as xml2js from 'xml2js';
import { create } from 'xmlbuilder2';
import {
  ActionFailedError,
  createModuleLogger,
  InvalidActionError,
  InvalidArgsError,
  UpnpActionError,
  type ContentDirectoryService,
} from 'cds-core';

const logger = createModuleLogger('SoapHandler');

const SOAP_ENV_NS = 'http://schemas.xmlsoap.org/soap/envelope/';
const SOAP_ENC_NS = 'http://schemas.xmlsoap.org/soap/encoding/';
const UPNP_CONTROL_NS = 'urn:schemas-upnp-org:control-1-0';

export const CONTENT_DIRECTORY_SERVICE_TYPE = 'urn:schemas-upnp-org:service:ContentDirectory:1';

/**
 * @hebrew הפעולות של השירות שנקודת הבקרה חושפת.
 */
export type ContentDirectoryActions = Pick<
  ContentDirectoryService,
  'browse' | 'search' | 'getSearchCapabilities' | 'getSortCapabilities' | 'getSystemUpdateId'
>;

export interface SoapRequest {
  action: string;
  args: Record<string, string>;
}

export type SoapValues = Record<string, string | number>;

export interface SoapReply {
  status: number;
  xml: string;
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

// ערך של ארגומנט: מחרוזת, או אלמנט עם מאפיינים שהטקסט שלו ב-'_'
function argumentText(value: unknown): string | undefined {
  if (typeof value === 'string') {
    return value;
  }
  if (isRecord(value)) {
    return typeof value._ === 'string' ? value._ : '';
  }
  return undefined;
}

/**
 * @hebrew מנתח מעטפת SOAP ומחזיר את שם הפעולה ואת הארגומנטים שלה.
 * @throws InvalidActionError אם הגוף אינו מעטפת SOAP עם אלמנט פעולה.
 */
export async function parseSoapRequest(xml: string): Promise<SoapRequest> {
  const parser = new xml2js.Parser({
    explicitArray: false,
    explicitRoot: false,
    tagNameProcessors: [xml2js.processors.stripPrefix],
  });

  let parsed: unknown;
  try {
    parsed = await parser.parseStringPromise(xml);
  } catch (error) {
    logger.debug('Failed to parse SOAP request body', { error });
    throw new InvalidActionError('Malformed SOAP request');
  }

  const body = isRecord(parsed) ? parsed.Body : undefined;
  if (!isRecord(body)) {
    throw new InvalidActionError('SOAP Body not found');
  }

  const action = Object.keys(body).find(key => key !== '$');
  if (!action) {
    throw new InvalidActionError('SOAP Body has no action element');
  }

  const args: Record<string, string> = {};
  const actionNode = body[action];
  if (isRecord(actionNode)) {
    for (const [name, value] of Object.entries(actionNode)) {
      const text = argumentText(value);
      if (name !== '$' && text !== undefined) {
        args[name] = text;
      }
    }
  }
  return { action, args };
}

/**
 * @hebrew מחלץ את שם הפעולה מכותרת SOAPACTION ("urn:...:ContentDirectory:1#Browse").
 */
export function actionFromHeader(header: string | undefined): string | undefined {
  if (!header) {
    return undefined;
  }
  const unquoted = header.trim().replace(/^"|"$/g, '');
  const hashIndex = unquoted.lastIndexOf('#');
  return hashIndex >= 0 ? unquoted.slice(hashIndex + 1) : undefined;
}

function requiredArg(args: Record<string, string>, name: string): string {
  const value = args[name];
  if (value === undefined) {
    throw new InvalidArgsError(`Missing argument ${name}`);
  }
  return value;
}

function integerArg(args: Record<string, string>, name: string): number {
  const value = (args[name] ?? '0').trim();
  if (!/^\d+$/.test(value)) {
    throw new InvalidArgsError(`${name} must be a non-negative integer`);
  }
  return Number(value);
}

/**
 * @hebrew מריץ פעולה של השירות ומחזיר את ערכי התשובה שלה.
 */
export async function invokeAction(service: ContentDirectoryActions, request: SoapRequest): Promise<SoapValues> {
  const { action, args } = request;

  switch (action) {
    case 'GetSearchCapabilities':
      return { SearchCaps: service.getSearchCapabilities() };

    case 'GetSortCapabilities':
      return { SortCaps: service.getSortCapabilities() };

    case 'GetSystemUpdateID':
      return { Id: service.getSystemUpdateId() };

    case 'Browse': {
      const result = await service.browse({
        objectId: requiredArg(args, 'ObjectID'),
        browseFlag: requiredArg(args, 'BrowseFlag'),
        filter: args.Filter ?? '*',
        startingIndex: integerArg(args, 'StartingIndex'),
        requestedCount: integerArg(args, 'RequestedCount'),
        sortCriteria: args.SortCriteria ?? '',
      });
      return {
        Result: result.result,
        NumberReturned: result.numberReturned,
        TotalMatches: result.totalMatches,
        UpdateID: result.updateId,
      };
    }

    case 'Search': {
      const result = await service.search({
        containerId: requiredArg(args, 'ContainerID'),
        searchCriteria: args.SearchCriteria ?? '*',
        filter: args.Filter ?? '*',
        startingIndex: integerArg(args, 'StartingIndex'),
        requestedCount: integerArg(args, 'RequestedCount'),
        sortCriteria: args.SortCriteria ?? '',
      });
      return {
        Result: result.result,
        NumberReturned: result.numberReturned,
        TotalMatches: result.totalMatches,
        UpdateID: result.updateId,
      };
    }

    default:
      throw new InvalidActionError(`Unknown action ${action}`);
  }
}

/**
 * @hebrew בונה מעטפת SOAP של תשובה מוצלחת.
 */
export function buildSoapResponse(action: string, values: SoapValues): string {
  const root = create({ version: '1.0', encoding: 'utf-8' })
    .ele('s:Envelope', { 'xmlns:s': SOAP_ENV_NS, 's:encodingStyle': SOAP_ENC_NS });
  const response = root.ele('s:Body').ele(`u:${action}Response`, { 'xmlns:u': CONTENT_DIRECTORY_SERVICE_TYPE });

  for (const [name, value] of Object.entries(values)) {
    response.ele(name).txt(String(value)).up();
  }
  return root.end({ prettyPrint: false });
}

/**
 * @hebrew בונה מעטפת SOAP Fault עם פרטי UPnPError.
 */
export function buildSoapFault(error: UpnpActionError): string {
  const root = create({ version: '1.0', encoding: 'utf-8' })
    .ele('s:Envelope', { 'xmlns:s': SOAP_ENV_NS, 's:encodingStyle': SOAP_ENC_NS });

  root.ele('s:Body').ele('s:Fault')
    .ele('faultcode').txt('s:Client').up()
    .ele('faultstring').txt('UPnPError').up()
    .ele('detail')
    .ele('UPnPError', { xmlns: UPNP_CONTROL_NS })
    .ele('errorCode').txt(String(error.code)).up()
    .ele('errorDescription').txt(error.message).up();

  return root.end({ prettyPrint: false });
}

/**
 * @hebrew מטפל בבקשת בקרה שלמה: ניתוח, הרצה ובניית תשובה או Fault.
 * @param soapActionHeader - ערך כותרת SOAPACTION, אם נשלחה.
 */
export async function handleControlRequest(
  service: ContentDirectoryActions,
  body: string,
  soapActionHeader: string | undefined,
): Promise<SoapReply> {
  try {
    const request = await parseSoapRequest(body);
    const headerAction = actionFromHeader(soapActionHeader);
    if (headerAction && headerAction !== request.action) {
      logger.warn(`SOAPACTION header names ${headerAction} but the body invokes ${request.action}`);
    }

    logger.debug(`Invoking ${request.action}`, request.args);
    const values = await invokeAction(service, request);
    return { status: 200, xml: buildSoapResponse(request.action, values) };
  } catch (error) {
    if (error instanceof UpnpActionError) {
      logger.info(`Action failed with UPnP error ${error.code}: ${error.message}`);
      return { status: 500, xml: buildSoapFault(error) };
    }
    logger.error('Unexpected error while handling a control request', { error });
    return { status: 500, xml: buildSoapFault(new ActionFailedError()) };
  }
}
