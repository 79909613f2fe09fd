/**
 * Modelo Questao (colecao `questoes`).
 */
import { Schema, model, models } from 'mongoose';
import { DIFICULDADES, LETRAS_ALTERNATIVAS, SENTINELA_REVISAO } from '../tipos';

const QuestaoSchema = new Schema(
  {
    fonteId: { type: String, required: true },
    numero: { type: Number, required: true },
    disciplina: { type: String, required: true },
    topico: { type: String, required: true },
    enunciado: { type: String, required: true },
    alternativas: {
      A: { type: String },
      B: { type: String },
      C: { type: String },
      D: { type: String },
      E: { type: String }
    },
    respostaCorreta: { type: String, required: true, enum: [...LETRAS_ALTERNATIVAS, SENTINELA_REVISAO] },
    explicacao: { type: String, default: '' },
    fundamentacaoLegal: { type: String, default: '' },
    dificuldade: { type: String, required: true, enum: [...DIFICULDADES] },
    anoProva: { type: Number },
    tags: [{ type: String }],
    hashConteudo: { type: String, required: true }
  },
  { timestamps: true, collection: 'questoes' }
);

QuestaoSchema.index({ hashConteudo: 1 }, { unique: true });
QuestaoSchema.index({ disciplina: 1, fonteId: 1, numero: 1 });
QuestaoSchema.index({ respostaCorreta: 1 });

export const Questao = models.Questao ?? model('Questao', QuestaoSchema);
