import { Clinic } from './entities/clinic.entity';

export interface ClinicCounts {
  userCount: number;
  doctorCount: number;
  patientCount: number;
}

export interface ClinicView extends ClinicCounts {
  id: number;
  name: string;
  contactNumber: string;
  address: string;
  description: string | null;
  isActive: boolean;
  isDeleted: boolean;
  createdAt: Date;
  updatedAt: Date;
}

export interface ClinicDetailView extends ClinicView {
  activeTreatmentsCount: number;
}

export interface ClinicStatistics {
  totalUsers: number;
  totalDoctors: number;
  totalPatients: number;
  activeTreatments: number;
  isActive: boolean;
}

export function presentClinic(clinic: Clinic, counts: ClinicCounts): ClinicView {
  return {
    id: clinic.id,
    name: clinic.name,
    contactNumber: clinic.contactNumber,
    address: clinic.address,
    description: clinic.description,
    isActive: clinic.isActive,
    isDeleted: clinic.isDeleted,
    ...counts,
    createdAt: clinic.createdAt,
    updatedAt: clinic.updatedAt,
  };
}
