import { createServer } from './createServer';
import { isReportApiEnabled, isSpreadsheetEnabled, loadConfig } from './config';
import { log } from './utils/log';

const config = loadConfig();
const app = createServer({ config });

if (!isReportApiEnabled(config)) {
  log.warn('Server', 'WCL_API_KEY not set, report checks are disabled');
}
if (!isSpreadsheetEnabled(config)) {
  log.warn('Server', 'GOOGLE_SERVICE_ACCOUNT_JSON not set, spreadsheet import is disabled');
}

app.listen(config.port, () => {
  log.info('Server', `listening on http://localhost:${config.port}`);
});
