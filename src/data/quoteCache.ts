import fs from 'fs';
import path from 'path';
import { ensureDir } from '../core/utils';
import { quoteSchema } from '../core/schema';
import { errorMessage } from '../core/errors';
import { Quote } from './marketData.types';

export const resolveQuoteCacheDir = () =>
  path.resolve(process.cwd(), process.env.QUOTE_CACHE_DIR || path.join('data_cache', 'quotes'));

const fileFor = (dir: string, symbol: string) => path.join(dir, `${symbol.replace(/[^A-Za-z0-9._-]/g, '_')}.json`);

export class QuoteCache {
  private dir: string;

  constructor(dir: string = resolveQuoteCacheDir()) {
    this.dir = dir;
  }

  public load(symbol: string): Quote | undefined {
    const file = fileFor(this.dir, symbol);
    if (!fs.existsSync(file)) return undefined;
    try {
      const parsed = quoteSchema.safeParse(JSON.parse(fs.readFileSync(file, 'utf-8')));
      return parsed.success ? parsed.data : undefined;
    } catch (err) {
      console.warn(`Ignoring unreadable quote cache ${file}: ${errorMessage(err)}`);
      return undefined;
    }
  }

  public save(quote: Quote) {
    ensureDir(this.dir);
    fs.writeFileSync(fileFor(this.dir, quote.symbol), JSON.stringify(quote, null, 2));
  }
}
