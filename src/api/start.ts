import dotenv from 'dotenv';
import log from '../utils/logger';
import { loadFactorTable, DEFAULT_FACTOR_TABLE_PATH } from '../data/factors';
import type { EmissionFactorTable } from '../models/EmissionFactorTable';
import { createApp } from './server';

dotenv.config();

const PORT = Number(process.env.PORT) || 3000;
const factorTablePath = process.env.FACTOR_TABLE_PATH || DEFAULT_FACTOR_TABLE_PATH;

function loadFactorTableOrExit(): EmissionFactorTable {
  try {
    const table = loadFactorTable(factorTablePath);
    log.config(`Emission factor table ${table.version} loaded`, { path: factorTablePath });
    return table;
  } catch (error) {
    log.error('Could not load emission factor table', error, { path: factorTablePath });
    return process.exit(1);
  }
}

const app = createApp({ factorTable: loadFactorTableOrExit() });

app.listen(PORT, () => {
  log.startup(`AgroCarbon API listening on http://localhost:${PORT}`);
  log.startup(`Health: http://localhost:${PORT}/health`);
});
