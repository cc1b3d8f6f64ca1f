export enum ErrorCode {
  // Auth errors
  Unauthenticated = 'Unauthenticated',
  Forbidden = 'Forbidden',
  EventNotActive = 'EventNotActive',
  InvalidCredentials = 'InvalidCredentials',
  RegistrationClosed = 'RegistrationClosed',
  MalformedHash = 'MalformedHash',

  // User errors
  UserNotFound = 'UserNotFound',
  UserAlreadyExists = 'UserAlreadyExists',

  // Store errors
  StoreUnavailable = 'StoreUnavailable',
  DatabaseTimeout = 'DatabaseTimeout',

  // General errors
  ConfigurationError = 'ConfigurationError',
  ValidationError = 'ValidationError',
  InternalError = 'InternalError',
}
