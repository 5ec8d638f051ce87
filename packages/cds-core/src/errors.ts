// שגיאות UPnP של שירות ה-ContentDirectory. כל שגיאה נושאת את קוד השגיאה של UPnP.

export class UpnpActionError extends Error {
  readonly code: number;

  constructor(code: number, message: string) {
    super(message);
    this.name = 'UpnpActionError';
    this.code = code;
  }
}

export class InvalidActionError extends UpnpActionError {
  constructor(message: string = 'Invalid Action') {
    super(401, message);
    this.name = 'InvalidActionError';
  }
}

export class InvalidArgsError extends UpnpActionError {
  constructor(message: string = 'Invalid Args') {
    super(402, message);
    this.name = 'InvalidArgsError';
  }
}

export class ActionFailedError extends UpnpActionError {
  constructor(message: string = 'Action Failed') {
    super(501, message);
    this.name = 'ActionFailedError';
  }
}

export class NoSuchObjectError extends UpnpActionError {
  constructor(message: string = 'No such object') {
    super(701, message);
    this.name = 'NoSuchObjectError';
  }
}

export class InvalidSearchCriteriaError extends UpnpActionError {
  constructor(message: string = 'Unsupported or invalid search criteria') {
    super(708, message);
    this.name = 'InvalidSearchCriteriaError';
  }
}

export class CannotProcessRequestError extends UpnpActionError {
  constructor(message: string) {
    super(720, `Cannot process the request (${message})`);
    this.name = 'CannotProcessRequestError';
  }
}

/**
 * @hebrew שגיאה שה-backend זורק כששאילתה לא ניתנת לביצוע.
 */
export class LibraryQueryError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'LibraryQueryError';
  }
}
