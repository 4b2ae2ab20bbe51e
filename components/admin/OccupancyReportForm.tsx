"use client";

import { useEffect } from "react";
import { useForm } from "react-hook-form";
import { zodResolver } from "@hookform/resolvers/zod";

import Button from "@/components/ui/Button";
import { FieldHelp, FieldLabel, Input } from "@/components/ui/Field";
import { apiPostJson, errorMessage } from "@/lib/api-client";
import { OccupancyReportSchema, type OccupancyReportValues } from "@/lib/schema";
import type { RoomView } from "@/lib/types";
import type { Toast } from "@/components/ToastBanner";

type Props = {
  /** room picked from the table ("Report" button) */
  selectedRoom: RoomView | null;
  onDone: (toast: Toast) => void;
};

export default function OccupancyReportForm({ selectedRoom, onDone }: Props) {
  const {
    register,
    handleSubmit,
    setValue,
    formState: { errors, isSubmitting },
  } = useForm<OccupancyReportValues>({
    resolver: zodResolver(OccupancyReportSchema),
    defaultValues: { roomId: "", occupancyLevel: 0 },
  });

  useEffect(() => {
    if (!selectedRoom) return;
    setValue("roomId", selectedRoom.roomId, { shouldValidate: true });
    setValue("occupancyLevel", selectedRoom.occupancyLevel);
  }, [selectedRoom, setValue]);

  const onSubmit = async (v: OccupancyReportValues) => {
    try {
      await apiPostJson(`/rooms/${encodeURIComponent(v.roomId)}/checkin`, { occupancy_level: v.occupancyLevel });
      onDone({ type: "success", message: `Reported ${v.occupancyLevel}% for ${v.roomId}` });
    } catch (e: unknown) {
      onDone({ type: "error", message: `Report failed: ${errorMessage(e)}` });
    }
  };

  return (
    <form onSubmit={handleSubmit(onSubmit)} className="grid gap-3 sm:grid-cols-[1fr_140px_auto] sm:items-end">
      <div>
        <FieldLabel htmlFor="report-room">Room</FieldLabel>
        <Input id="report-room" placeholder="e.g. UB-0101" {...register("roomId")} />
        {errors.roomId ? <FieldHelp tone="error">{errors.roomId.message}</FieldHelp> : null}
      </div>
      <div>
        <FieldLabel htmlFor="report-level">Occupancy %</FieldLabel>
        <Input id="report-level" type="number" min={0} max={100} {...register("occupancyLevel", { valueAsNumber: true })} />
        {errors.occupancyLevel ? <FieldHelp tone="error">{errors.occupancyLevel.message}</FieldHelp> : null}
      </div>
      <Button type="submit" busy={isSubmitting} busyLabel="Sending…">
        Report
      </Button>
    </form>
  );
}
