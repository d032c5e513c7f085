import { fullNameOf } from '../users/user.presenter';
import { TreatmentView } from '../treatments/treatment.presenter';
import { Gender, GENDER_LABELS, Patient } from './entities/patient.entity';

export interface PatientView {
  id: number;
  clinic: number;
  clinicName: string | null;
  firstName: string;
  lastName: string;
  fullName: string;
  email: string;
  contactNumber: string | null;
  secondaryContactNumber: string | null;
  address: string | null;
  gender: Gender | null;
  genderDisplay: string | null;
  dateOfBirth: string | null;
  age: number | null;
  assignedDoctor: number | null;
  doctorName: string | null;
  doctorEmail: string | null;
  medicalHistory: string | null;
  allergies: string | null;
  clinicalHistory: string | null;
  notes: string | null;
  activeTreatmentsCount: number;
  isActive: boolean;
  isDeleted: boolean;
  createdAt: Date;
  updatedAt: Date;
}

export interface PatientDetailView extends PatientView {
  treatments: TreatmentView[];
}

export interface MedicalSummary {
  id: number;
  fullName: string;
  age: number | null;
  gender: string | null;
  medicalHistory: string | null;
  allergies: string | null;
  clinicalHistory: string | null;
}

/**
 * Whole years between an ISO date of birth and `today`, or null when the
 * date is unknown or unparseable.
 */
export function ageOn(dateOfBirth: string | null, today: Date): number | null {
  if (!dateOfBirth) {
    return null;
  }
  const match = /^(\d{4})-(\d{2})-(\d{2})/.exec(dateOfBirth);
  if (!match) {
    return null;
  }
  const [year, month, day] = [Number(match[1]), Number(match[2]), Number(match[3])];

  let age = today.getUTCFullYear() - year;
  const beforeBirthday =
    today.getUTCMonth() + 1 < month || (today.getUTCMonth() + 1 === month && today.getUTCDate() < day);
  if (beforeBirthday) {
    age -= 1;
  }
  return age;
}

function patientFullName(patient: Pick<Patient, 'firstName' | 'lastName'>): string {
  return `${patient.firstName} ${patient.lastName}`.trim();
}

export function presentPatient(patient: Patient, activeTreatmentsCount: number, today: Date = new Date()): PatientView {
  return {
    id: patient.id,
    clinic: patient.clinicId,
    clinicName: patient.clinic?.name ?? null,
    firstName: patient.firstName,
    lastName: patient.lastName,
    fullName: patientFullName(patient),
    email: patient.email,
    contactNumber: patient.contactNumber,
    secondaryContactNumber: patient.secondaryContactNumber,
    address: patient.address,
    gender: patient.gender,
    genderDisplay: patient.gender ? GENDER_LABELS[patient.gender] : null,
    dateOfBirth: patient.dateOfBirth,
    age: ageOn(patient.dateOfBirth, today),
    assignedDoctor: patient.assignedDoctorId,
    doctorName: patient.assignedDoctor ? fullNameOf(patient.assignedDoctor) : null,
    doctorEmail: patient.assignedDoctor?.email ?? null,
    medicalHistory: patient.medicalHistory,
    allergies: patient.allergies,
    clinicalHistory: patient.clinicalHistory,
    notes: patient.notes,
    activeTreatmentsCount,
    isActive: patient.isActive,
    isDeleted: patient.isDeleted,
    createdAt: patient.createdAt,
    updatedAt: patient.updatedAt,
  };
}

export function presentMedicalSummary(patient: Patient, today: Date = new Date()): MedicalSummary {
  return {
    id: patient.id,
    fullName: patientFullName(patient),
    age: ageOn(patient.dateOfBirth, today),
    gender: patient.gender ? GENDER_LABELS[patient.gender] : null,
    medicalHistory: patient.medicalHistory,
    allergies: patient.allergies,
    clinicalHistory: patient.clinicalHistory,
  };
}
