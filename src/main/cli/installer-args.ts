import type { InstallationDetails } from '@shared/contracts';

export interface InstallerArgs {
  installPath: string | null;
  details: InstallationDetails;
  targetVersion: string | null;
  reconfigure: boolean;
  inPlace: boolean;
  acceptBreakingChanges: boolean;
  help: boolean;
}

export const INSTALLER_USAGE = [
  'Uso: storefront-installer [opcoes]',
  '',
  '  --install-path <dir>   diretorio da instalacao nova',
  '  --site-name <nome>     nome do site',
  '  --db-server <host>     servidor de banco de dados',
  '  --db-name <nome>       banco de dados',
  '  --version <versao>     instala ou atualiza para uma versao especifica',
  '  --reconfigure          apenas atualiza os dados da instalacao existente',
  '  --in-place             aplica o upgrade neste processo, sem iniciar o upgrader',
  '  --yes                  aceita mudancas incompativeis sem perguntar',
  '  -h, --help             mostra esta ajuda'
].join('\n');

const VALUE_FLAGS = ['--install-path', '--site-name', '--db-server', '--db-name', '--version'] as const;
type ValueFlag = (typeof VALUE_FLAGS)[number];

export function parseInstallerArgs(argv: readonly string[]): InstallerArgs {
  const args: InstallerArgs = {
    installPath: null,
    details: {},
    targetVersion: null,
    reconfigure: false,
    inPlace: false,
    acceptBreakingChanges: false,
    help: false
  };

  for (let i = 0; i < argv.length; i += 1) {
    const token = argv[i] ?? '';
    if (token === '--reconfigure') {
      args.reconfigure = true;
    } else if (token === '--in-place') {
      args.inPlace = true;
    } else if (token === '--yes' || token === '-y') {
      args.acceptBreakingChanges = true;
    } else if (token === '--help' || token === '-h') {
      args.help = true;
    } else if (isValueFlag(token)) {
      const value = argv[i + 1]?.trim();
      if (!value || value.startsWith('--')) {
        throw new Error(`Valor ausente para ${token}`);
      }
      assignValue(args, token, value);
      i += 1;
    } else {
      throw new Error(`Argumento desconhecido: ${token}`);
    }
  }

  return args;
}

function assignValue(args: InstallerArgs, flag: ValueFlag, value: string): void {
  switch (flag) {
    case '--install-path':
      args.installPath = value;
      break;
    case '--site-name':
      args.details.siteName = value;
      break;
    case '--db-server':
      args.details.databaseServer = value;
      break;
    case '--db-name':
      args.details.databaseName = value;
      break;
    case '--version':
      args.targetVersion = value;
      break;
  }
}

function isValueFlag(token: string): token is ValueFlag {
  return VALUE_FLAGS.some((flag) => flag === token);
}
