import dotenv from 'dotenv';

// Imported first by the entry points so that .env is applied before the logger reads it.
dotenv.config();
