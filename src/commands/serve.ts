import chalk from 'chalk';
import { startServer } from '../server/index.js';
import { loadConfig } from '../utils/index.js';

export async function serveCommand(options: { port?: number; config?: string }): Promise<string> {
  const config = await loadConfig(options.config);
  const port = options.port ?? config.serverPort;

  console.log(chalk.cyan('Starting duplicate scan API...'));
  console.log(chalk.dim('Press Ctrl+C to stop the server.'));

  const url = startServer(port, { configPath: options.config });

  console.log(chalk.green(`\nAPI available at: ${chalk.underline(url)}\n`));
  return url;
}
