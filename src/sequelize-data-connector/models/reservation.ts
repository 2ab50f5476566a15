import { DataTypes, Sequelize } from "sequelize";
import { ReservationStatus } from "../../base-data-connector";

export const defineReservation = (sequelize: Sequelize) => sequelize.define('reservation', {
    usuarioId: { type: DataTypes.INTEGER, allowNull: false },
    libroId: { type: DataTypes.INTEGER, allowNull: false },
    fechaReserva: { type: DataTypes.DATE, allowNull: false },
    estado: { type: DataTypes.ENUM, values: Object.values(ReservationStatus), allowNull: false },
    fechaNotificacion: { type: DataTypes.DATE, allowNull: true },
    fechaExpiracion: { type: DataTypes.DATE, allowNull: true },
    prioridad: { type: DataTypes.INTEGER, allowNull: false },
}, { timestamps: false });
