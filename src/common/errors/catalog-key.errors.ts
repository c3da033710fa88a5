/**
 * 🛡️ 카탈로그 키 에러 정의
 * 정규화/검증 함수가 던지는 에러는 모두 CatalogKeyError를 상속한다.
 */

export enum ErrorCodes {
  // 호출 파라미터 오류 (길이 범위 등)
  INVALID_ARGUMENT = 'INVALID_ARGUMENT',

  // 정규화할 수 있는 문자가 없는 입력
  INVALID_INPUT = 'INVALID_INPUT',

  // 검증 규칙 위반
  VALIDATION_ERROR = 'VALIDATION_ERROR',

  // 일반 에러
  INTERNAL_SERVER_ERROR = 'INTERNAL_SERVER_ERROR',
}

export class CatalogKeyError extends Error {
  constructor(
    readonly code: ErrorCodes,
    message: string,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class InvalidArgumentError extends CatalogKeyError {
  constructor(message: string) {
    super(ErrorCodes.INVALID_ARGUMENT, message);
  }
}

export class InvalidInputError extends CatalogKeyError {
  constructor(message: string) {
    super(ErrorCodes.INVALID_INPUT, message);
  }
}

export class KeyValidationError extends CatalogKeyError {
  constructor(message: string) {
    super(ErrorCodes.VALIDATION_ERROR, message);
  }
}
