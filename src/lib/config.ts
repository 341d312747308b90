import path from 'node:path';

// Sample file served by the home page, relative to the application root
export const DATA_FILE = path.join(process.cwd(), 'data', 'df_transicion.csv');
