import type { Parser } from '@internwatch/parser-sdk';
import { internListParser } from '@internwatch/parser-intern-list';
import { jobrightParser } from '@internwatch/parser-jobright';

export const parsers: Parser[] = [internListParser, jobrightParser];
