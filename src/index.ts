import dotenv from 'dotenv';
import { loadConfig } from '@/config';
import { createApp } from '@/app';

dotenv.config();

const config = loadConfig();
const app = createApp(config);

app.listen(config.port, () => {
  console.log(`Server running at http://localhost:${config.port}`);
});
