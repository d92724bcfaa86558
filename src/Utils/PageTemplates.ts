import { html } from "hono/html";
import type { AttendanceRecord, Notice } from "../Types/types";
import { DateUtils } from "./DateUtils";

export class PageTemplates {
  /**
   * Attendance page: clock-in/out form, the latest notice and every record.
   */
  static renderAttendancePage(records: AttendanceRecord[], notice: Notice | null) {
    return html`<!DOCTYPE html>
<html lang="en">
<head>
    <meta charset="UTF-8">
    <meta name="viewport" content="width=device-width, initial-scale=1.0">
    <title>Lab Attendance</title>
    <style>
        body {
            font-family: Arial, sans-serif;
            line-height: 1.6;
            color: #333;
            max-width: 900px;
            margin: 0 auto;
            padding: 20px;
        }
        .container {
            background: #f9f9f9;
            padding: 30px;
            border-radius: 10px;
            border: 1px solid #ddd;
        }
        .header {
            text-align: center;
            color: #2c3e50;
        }
        .notice {
            border-radius: 5px;
            padding: 15px;
            margin: 20px 0;
        }
        .notice-success {
            background: #d4edda;
            border: 1px solid #c3e6cb;
            color: #155724;
        }
        .notice-error {
            background: #fff3cd;
            border: 1px solid #ffeaa7;
            color: #856404;
        }
        form input {
            padding: 8px;
            margin-right: 8px;
        }
        .btn {
            border: none;
            color: white;
            padding: 10px 24px;
            border-radius: 5px;
            cursor: pointer;
        }
        .btn-in { background: #27ae60; }
        .btn-out { background: #c0392b; }
        table {
            width: 100%;
            border-collapse: collapse;
            margin-top: 30px;
        }
        th, td {
            text-align: left;
            padding: 8px;
            border-bottom: 1px solid #ddd;
        }
        .active { color: #27ae60; font-weight: bold; }
        .empty { text-align: center; color: #777; }
    </style>
</head>
<body>
    <div class="container">
        <h1 class="header">Student Lab Attendance</h1>
        ${notice ? PageTemplates.renderNotice(notice) : ""}
        <form method="post" action="/">
            <input type="text" name="matric_no" placeholder="Matric No" required>
            <input type="text" name="name" placeholder="Name" required>
            <button class="btn btn-in" type="submit" name="action" value="clock_in">Clock In</button>
            <button class="btn btn-out" type="submit" name="action" value="clock_out">Clock Out</button>
        </form>
        ${PageTemplates.renderRecordsTable(records)}
    </div>
</body>
</html>`;
  }

  static renderNotice(notice: Notice) {
    return html`<div class="notice notice-${notice.kind}" role="status">${notice.text}</div>`;
  }

  static renderRecordsTable(records: AttendanceRecord[]) {
    if (records.length === 0) {
      return html`<p class="empty">No attendance records yet.</p>`;
    }

    return html`<table>
            <thead>
                <tr><th>Matric No</th><th>Name</th><th>Date</th><th>Clock In</th><th>Clock Out</th></tr>
            </thead>
            <tbody>
                ${records.map((record) => PageTemplates.renderRecordRow(record))}
            </tbody>
        </table>`;
  }

  static renderRecordRow(record: AttendanceRecord) {
    const clockOut = DateUtils.formatTime12hr(record.clockOut);

    return html`<tr>
                    <td>${record.matricNo}</td>
                    <td>${record.name}</td>
                    <td>${record.date}</td>
                    <td>${DateUtils.formatTime12hr(record.clockIn)}</td>
                    <td>${clockOut ?? html`<span class="active">Clocked in</span>`}</td>
                </tr>`;
  }
}

export default PageTemplates;
