/**
 * Endpoint de saude para monitoramento da API e do banco.
 */
import { Router } from 'express';
import { estadoBaseDados } from '../../infraestrutura/baseDados/mongoose';
import { exportarMetricasPrometheus } from '../observabilidade/metricas';

const router = Router();

router.get('/', (_req, res) => {
  res.json({
    estado: 'ok',
    servico: 'api-banco-questoes',
    tempoAtivoSegundos: Math.floor(process.uptime()),
    db: { estado: estadoBaseDados() }
  });
});

router.get('/live', (_req, res) => {
  res.json({ estado: 'ok', servico: 'api-banco-questoes' });
});

router.get('/metrics', (_req, res) => {
  res.setHeader('Content-Type', 'text/plain; version=0.0.4; charset=utf-8');
  res.send(exportarMetricasPrometheus());
});

export default router;
