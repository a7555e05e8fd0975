/**
 * Frame shared by every alert email: a stripe in the urgency color, the
 * product name, the alert body and a note on how to stop the alerts.
 */

import { Body, Container, Head, Html, Preview, Section, Text } from '@react-email/components';
// eslint-disable-next-line @typescript-eslint/naming-convention -- library name
import * as React from 'react';

const PRODUCT_NAME = 'Farm Ledger';

const frame = {
  page: {
    backgroundColor: '#f4f6f3',
    fontFamily: 'Helvetica, Arial, sans-serif',
    margin: '0',
    padding: '32px 0',
  },
  card: {
    backgroundColor: '#ffffff',
    border: '1px solid #dfe5dc',
    margin: '0 auto',
    maxWidth: '560px',
  },
  brand: {
    color: '#2f4f2f',
    fontSize: '13px',
    fontWeight: '700',
    letterSpacing: '1px',
    margin: '0',
    padding: '16px 28px 0',
    textTransform: 'uppercase',
  },
  body: { padding: '4px 28px 12px' },
  note: {
    borderTop: '1px solid #dfe5dc',
    color: '#7b8579',
    fontSize: '12px',
    lineHeight: '18px',
    margin: '0',
    padding: '14px 28px 18px',
  },
} satisfies Record<string, React.CSSProperties>;

export interface EmailLayoutProps {
  previewText: string;
  /** Color of the stripe above the card, usually the urgency color */
  accentColor: string;
  children: React.ReactNode;
}

export const EmailLayout: React.FC<EmailLayoutProps> = ({ previewText, accentColor, children }) => (
  <Html lang="pt-BR">
    <Head />
    <Preview>{previewText}</Preview>
    <Body style={frame.page}>
      <Container style={{ ...frame.card, borderTop: `6px solid ${accentColor}` }}>
        <Text style={frame.brand}>{PRODUCT_NAME}</Text>
        <Section style={frame.body}>{children}</Section>
        <Text style={frame.note}>
          Alerta automático do {PRODUCT_NAME}. Para deixar de recebê-lo, desative os alertas no
          cadastro do documento ou da dívida.
        </Text>
      </Container>
    </Body>
  </Html>
);
