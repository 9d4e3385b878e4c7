import { cleanEnv, str, bool, num } from 'envalid';
import * as dotenv from 'dotenv';

dotenv.config();

const config = cleanEnv(process.env, {
  LOG_LEVEL: str({
    choices: ['debug', 'info', 'warn', 'error'],
    default: 'info',
  }),
  FEED_PRODUCTS_FILE: str({ default: './input/products.csv' }),
  FEED_PRICING_FILE: str({ default: '' }),
  FEED_AVAILABILITY_FILE: str({ default: '' }),
  IMAGE_BASE_URL: str({ default: '' }),
  MINIFY_DESCRIPTION_HTML: bool({ default: false }),
  OUTPUT_DIR: str({ default: './output' }),
  EXPORT_FILENAME: str({ default: 'product_import.csv' }),
  KNOWN_SET_STORE: str({ choices: ['file', 'mongo'], default: 'file' }),
  KNOWN_SET_FILE: str({ default: './known_skus.json' }),
  MONGODB_URI: str({ default: '' }),
  KNOWN_SET_NAME: str({ default: 'default' }),
  // No default: reactivating an archived product is a pricing decision
  REACTIVATION_POLICY: str({ choices: ['create', 'update'] }),
  ARCHIVE_GUARD_RATIO: num({ default: 1 }),
});

export default config;
