/**
 * Toast notifications
 *
 * User-visible, dismissable messages. Delivery is best-effort: a sink that
 * throws or rejects is logged and otherwise ignored.
 */

import { createLogger, type Logger } from '@/lib/security/logger';
import { getErrorMessage } from '@/lib/errors';

const log = createLogger('toast');

export type ToastVariant = 'success' | 'error' | 'warning' | 'info';
export type ToastMode = 'dismissable' | 'sticky' | 'pester';

export interface Toast {
  title: string;
  message: string;
  variant: ToastVariant;
  mode?: ToastMode;
}

export interface ToastSignal {
  show(toast: Toast): void | Promise<void>;
}

/**
 * Hand a toast to a sink without letting the sink's failure escape.
 */
export function showToast(signal: ToastSignal, toast: Toast): void {
  const report = (error: unknown) => {
    log.warn('Toast delivery failed', { title: toast.title, error: getErrorMessage(error) });
  };

  try {
    Promise.resolve(signal.show({ mode: 'dismissable', ...toast })).catch(report);
  } catch (error) {
    report(error);
  }
}

export function successToast(message: string, title: string = 'Success'): Toast {
  return { title, message, variant: 'success', mode: 'dismissable' };
}

export function errorToast(title: string, message: string): Toast {
  return { title, message, variant: 'error', mode: 'dismissable' };
}

/**
 * Sink that writes toasts to a logger. Used by server-side runs that have
 * no user to show them to.
 */
export function createLoggingToastSignal(target: Logger = log): ToastSignal {
  return {
    show(toast: Toast) {
      const data = { title: toast.title, variant: toast.variant };
      if (toast.variant === 'error') {
        target.error(toast.message, data);
      } else if (toast.variant === 'warning') {
        target.warn(toast.message, data);
      } else {
        target.info(toast.message, data);
      }
    },
  };
}
