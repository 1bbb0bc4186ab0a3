import { Command } from 'commander';
import { config } from '../../config/config';
import { signOperatorToken } from '../../api/middleware/auth';

export function tokenCommand(program: Command): void {
  program
    .command('token <operatorId>')
    .description('Mint an operator API token (the operator must be listed in ADMIN_IDS)')
    .option('-e, --expires-in <duration>', 'token lifetime, e.g. 12h or 30d', config.auth.jwtExpiresIn)
    .action((operatorId: string, options: { expiresIn: string }) => {
      if (!config.auth.adminIds.includes(operatorId)) {
        console.warn(`Warning: ${operatorId} is not in ADMIN_IDS, the API will refuse this token`);
      }
      console.log(signOperatorToken(operatorId, config.auth.jwtSecret, options.expiresIn));
    });
}
