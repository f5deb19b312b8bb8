import type { DownloadProgress, OrchestrationResult, OrchestrationTransition } from '@shared/contracts';
import { describeProgress } from '@main/services/download/DownloadProgress';

const PHASE_LABELS: Record<OrchestrationTransition['to'], string> = {
  detecting: 'Verificando instalacao existente...',
  'fresh-install': 'Nenhuma instalacao encontrada. Preparando instalacao nova.',
  upgrading: 'Instalacao encontrada. Preparando upgrade.',
  reconfiguring: 'Reconfigurando instalacao.',
  resolving: 'Consultando releases disponiveis...',
  validating: 'Validando upgrade...',
  downloading: 'Baixando pacote...',
  'handing-off': 'Iniciando o upgrader...',
  applying: 'Aplicando release...',
  committing: 'Registrando instalacao...',
  succeeded: 'Concluido.',
  failed: 'Falhou.',
  'handed-off': 'Upgrade entregue ao upgrader.'
};

export interface ProgressReporter {
  onTransition: (transition: OrchestrationTransition) => void;
  onProgress: (progress: DownloadProgress) => void;
}

const UNKNOWN_TOTAL_STEP_BYTES = 1024 * 1024;

export function createProgressReporter(write: (line: string) => void): ProgressReporter {
  let lastStep: string | null = null;
  return {
    onTransition: (transition) => {
      write(PHASE_LABELS[transition.to]);
    },
    onProgress: (progress) => {
      // uma linha por ponto percentual; sem tamanho total, uma por MiB recebido
      const step =
        progress.totalBytes > 0
          ? `pct:${progress.percentComplete}`
          : `mib:${Math.floor(progress.bytesReceived / UNKNOWN_TOTAL_STEP_BYTES)}`;
      if (step === lastStep) {
        return;
      }
      lastStep = step;
      write(describeProgress(progress));
    }
  };
}

export function formatResult(result: OrchestrationResult): string {
  const prefix = result.ok ? 'OK' : `ERRO (${result.errorCode ?? 'desconhecido'})`;
  return `${prefix}: ${result.message}`;
}

export function exitCodeFor(result: OrchestrationResult): number {
  return result.ok ? 0 : 1;
}
