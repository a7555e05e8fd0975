/**
 * Deadline Alert Renderer
 *
 * React Email adapter turning a due alert into subject, HTML and text.
 */

import { render } from '@react-email/render';
import { ok, err, type Result } from 'neverthrow';
// eslint-disable-next-line @typescript-eslint/naming-convention -- library name
import * as React from 'react';

import { buildSubject } from '../../core/email-content.js';
import { createRenderError, type RenderError } from '../../core/errors.js';
import { DeadlineAlertEmail } from '../templates/deadline-alert.js';

import type { AlertEmailRenderer } from '../../core/ports.js';
import type { DueAlert, RenderedAlertEmail } from '../../core/types.js';
import type { Logger } from 'pino';

export interface DeadlineAlertRendererConfig {
  logger: Logger;
}

export const makeDeadlineAlertRenderer = (
  config: DeadlineAlertRendererConfig
): AlertEmailRenderer => {
  const log = config.logger.child({ component: 'DeadlineAlertRenderer' });

  return {
    async render(alert: DueAlert): Promise<Result<RenderedAlertEmail, RenderError>> {
      const { kind, id } = alert.obligation;

      try {
        const element = React.createElement(DeadlineAlertEmail, { alert });

        const html = await render(element, { pretty: true });
        const text = await render(element, { plainText: true });

        log.debug(
          { kind, obligationId: id, htmlLength: html.length, textLength: text.length },
          'Deadline alert rendered'
        );

        return ok({ subject: buildSubject(alert), html, text });
      } catch (error) {
        log.error({ err: error, kind, obligationId: id }, 'Failed to render deadline alert');
        return err(
          createRenderError(error instanceof Error ? error.message : 'Unknown render error')
        );
      }
    },
  };
};
