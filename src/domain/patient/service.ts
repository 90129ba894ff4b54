import { z } from 'zod';
import type { Logger } from 'pino';
import {
  LANGUAGES,
  PATIENT_CONDITIONS,
  type Clock,
  type DocumentStore,
  type Language,
  type Patient,
  type PatientCondition,
} from '../../shared/types';
import { PatientNotFoundError, PersistenceError } from '../../shared/errors';

export const PATIENTS_COLLECTION = 'patients';

const patientSchema = z.object({
  id: z.string(),
  name: z.string(),
  nationality: z.string().optional(),
  age: z.union([z.number().int(), z.string()]).optional(),
  education: z.string().optional(),
  condition: z.enum(PATIENT_CONDITIONS),
  language: z.enum(LANGUAGES),
  registrationDate: z.string(),
});

export interface RegistrationInput {
  id: string;
  name: string;
  nationality?: string;
  age?: number | string;
  education?: string;
  condition: PatientCondition;
  language: Language;
}

export class PatientService {
  constructor(
    private store: DocumentStore,
    private logger: Logger,
    private clock: Clock = () => new Date()
  ) {}

  async findById(id: string): Promise<Patient | null> {
    const document = await this.store.findOne(PATIENTS_COLLECTION, { id });
    if (!document) {
      return null;
    }

    const parsed = patientSchema.safeParse(document);
    if (!parsed.success) {
      throw new PersistenceError(`Stored patient ${id} is invalid: ${parsed.error.message}`);
    }
    return parsed.data;
  }

  async getById(id: string): Promise<Patient> {
    const patient = await this.findById(id);
    if (!patient) {
      throw new PatientNotFoundError(id);
    }
    return patient;
  }

  /**
   * Create the patient, or overwrite the profile of a returning one. The
   * registration date of an existing patient is kept.
   */
  async register(input: RegistrationInput): Promise<Patient> {
    const existing = await this.findById(input.id);

    const patient: Patient = {
      ...input,
      registrationDate: existing?.registrationDate ?? this.clock().toISOString(),
    };

    await this.save(patient);
    this.logger.info({ patientId: patient.id, isNew: !existing }, 'Patient registered');
    return patient;
  }

  async updateLanguage(id: string, language: Language): Promise<Patient> {
    const patient = await this.getById(id);
    const updated: Patient = { ...patient, language };
    await this.save(updated);

    this.logger.info({ patientId: id, from: patient.language, to: language }, 'Patient language updated');
    return updated;
  }

  private async save(patient: Patient): Promise<void> {
    await this.store.upsert(PATIENTS_COLLECTION, patient.id, patient);
  }
}
