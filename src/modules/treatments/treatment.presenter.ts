import { fullNameOf } from '../users/user.presenter';
import { Treatment, TreatmentStatus, TreatmentType } from './entities/treatment.entity';

export interface TreatmentView {
  id: number;
  clinic: number;
  clinicName: string | null;
  patient: number;
  patientName: string | null;
  patientEmail: string | null;
  doctor: number | null;
  doctorName: string | null;
  treatmentType: TreatmentType;
  treatmentInformation: string;
  treatmentFindings: string | null;
  uploadImage: string | null;
  nextVisitDate: Date | null;
  status: TreatmentStatus;
  isUpcoming: boolean;
  isOverdue: boolean;
  isDeleted: boolean;
  createdAt: Date;
  updatedAt: Date;
}

export function isUpcoming(treatment: Pick<Treatment, 'nextVisitDate'>, now: Date): boolean {
  return treatment.nextVisitDate !== null && treatment.nextVisitDate.getTime() > now.getTime();
}

export function isOverdue(treatment: Pick<Treatment, 'nextVisitDate' | 'status'>, now: Date): boolean {
  return (
    treatment.nextVisitDate !== null &&
    treatment.nextVisitDate.getTime() < now.getTime() &&
    treatment.status === TreatmentStatus.ONGOING
  );
}

/**
 * Expects `patient`, `doctor` and `clinic` loaded; missing relations render
 * as null names.
 */
export function presentTreatment(treatment: Treatment, now: Date = new Date()): TreatmentView {
  return {
    id: treatment.id,
    clinic: treatment.clinicId,
    clinicName: treatment.clinic?.name ?? null,
    patient: treatment.patientId,
    patientName: treatment.patient ? `${treatment.patient.firstName} ${treatment.patient.lastName}`.trim() : null,
    patientEmail: treatment.patient?.email ?? null,
    doctor: treatment.doctorId,
    doctorName: treatment.doctor ? fullNameOf(treatment.doctor) : null,
    treatmentType: treatment.treatmentType,
    treatmentInformation: treatment.treatmentInformation,
    treatmentFindings: treatment.treatmentFindings,
    uploadImage: treatment.uploadImage,
    nextVisitDate: treatment.nextVisitDate,
    status: treatment.status,
    isUpcoming: isUpcoming(treatment, now),
    isOverdue: isOverdue(treatment, now),
    isDeleted: treatment.isDeleted,
    createdAt: treatment.createdAt,
    updatedAt: treatment.updatedAt,
  };
}
