import { Locale } from './config';
import { ApiError, ApiErrorType } from './errors';

export interface MessageCatalog {
  sessionExpired: string;
  loginRequired: string;
  notFound: string;
  serverError: string;
  timedOut: string;
  connectionFailed: string;
  invalidResponse: string;
  alreadySelected: (name: string) => string;
  unknown: string;
}

export const MESSAGES: Record<Locale, MessageCatalog> = {
  en: {
    sessionExpired: 'Your session has expired. Please sign in again.',
    loginRequired: 'Please sign in to continue.',
    notFound: 'The requested data could not be found.',
    serverError: 'The server ran into a problem. Please try again in a moment.',
    timedOut: 'The request timed out. Please try again.',
    connectionFailed: 'Could not reach the server. Check your internet connection.',
    invalidResponse: 'The server sent data this app could not read.',
    alreadySelected: (name) => `“${name}” is already selected`,
    unknown: 'Something went wrong. Please try again later.',
  },
  ja: {
    sessionExpired: 'ログインの有効期限が切れています。再度ログインしてください',
    loginRequired: 'ログインが必要です',
    notFound: 'データが見つかりませんでした',
    serverError: 'サーバーで問題が発生しています。しばらくしてから再度お試しください',
    timedOut: '通信がタイムアウトしました。再度お試しください',
    connectionFailed: 'インターネット接続を確認してください',
    invalidResponse: 'サーバーからのデータを読み込めませんでした',
    alreadySelected: (name) => `「${name}」は既に選択されています`,
    unknown: 'エラーが発生しました。しばらくしてから再度お試しください',
  },
};

/** User-visible, localized text for an error. */
export function describeError(error: ApiError, locale: Locale): string {
  const m = MESSAGES[locale];
  switch (error.type) {
    case ApiErrorType.UNAUTHENTICATED:
      return error.status === 401 ? m.sessionExpired : m.loginRequired;
    case ApiErrorType.DUPLICATE_SELECTION:
      return m.alreadySelected(error.detail ?? '');
    case ApiErrorType.DECODE:
      return m.invalidResponse;
    case ApiErrorType.TRANSPORT:
      return error.timedOut ? m.timedOut : m.connectionFailed;
    case ApiErrorType.HTTP_STATUS: {
      const status = error.status ?? 0;
      if (status === 404) return m.notFound;
      if (status >= 500) return m.serverError;
      return error.detail ?? m.unknown;
    }
    default:
      return m.unknown;
  }
}
